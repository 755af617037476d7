export interface User {
  id: number;
  username: string;
  password: string;
}

export type NewUser = Omit<User, 'id'>;

// Fields are combined with AND
export type UserFilter = Pick<User, 'username'> & Partial<Pick<User, 'password'>>;
