import { UserFilter } from './User';

export interface SqlStatement {
  sql: string;
  values: string[];
}

export const buildUserQuery = (filter: UserFilter): SqlStatement => {
  const whereClauses = ['`username` = ?'];
  const values = [filter.username];

  if (filter.password !== undefined) {
    whereClauses.push('`password` = ?');
    values.push(filter.password);
  }

  return {
    sql: 'SELECT `id`, `username`, `password` FROM `users` WHERE ' + whereClauses.join(' AND ') + ' LIMIT 1',
    values,
  };
};

export const INSERT_USER = 'INSERT INTO `users` (`username`, `password`) VALUES (?, ?)';
