/**
 * Configuration
 */
export interface ServiceConfig {
  port: number;
  dbPath: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const dbPath = env.DB_PATH;
  if (!dbPath) {
    throw new Error('DB_PATH environment variable is required');
  }

  const port = Number(env.PORT ?? 3000);
  if (!Number.isInteger(port) || port < 0) {
    throw new Error(`PORT must be a non-negative integer, got "${env.PORT}"`);
  }

  return { port, dbPath };
}
