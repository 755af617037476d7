export interface DatabaseConfig {
  host?: string;
  port: number;
  user?: string;
  password?: string;
  database?: string;
  connectionLimit: number;
}

export interface AppConfig {
  port: number;
  db: DatabaseConfig;
  allowedOrigins: string[];
}

const DEFAULT_PORT = 3000;
const DEFAULT_DB_PORT = 3306;
const DEFAULT_CONNECTION_LIMIT = 10;

const parseNumber = (name: string, value: string | undefined, fallback: number): number => {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const allowedOrigins = ['http://localhost:5173'];
  if (env.FRONTEND_PATH) allowedOrigins.push(env.FRONTEND_PATH);

  return {
    port: parseNumber('PORT', env.PORT, DEFAULT_PORT),
    db: {
      host: env.DB_HOST,
      port: parseNumber('DB_PORT', env.DB_PORT, DEFAULT_DB_PORT),
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      database: env.DB_NAME,
      connectionLimit: parseNumber('DB_CONNECTION_LIMIT', env.DB_CONNECTION_LIMIT, DEFAULT_CONNECTION_LIMIT),
    },
    allowedOrigins,
  };
};
