export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
  logging: boolean;
}

export const dbConfig = (): { database: DatabaseConfig } => ({
  database: {
    host: process.env.DB_HOST || 'localhost',
    port: Number(process.env.DB_PORT) || 5432, // porta padrão do PostgreSQL
    database: process.env.DB_DATABASE || 'dbname',
    username: process.env.DB_USERNAME || 'postgres',
    password: process.env.DB_PASSWORD || 'pw',
    logging: process.env.DB_LOGGING_ENABLED == 'true',
  },
});
