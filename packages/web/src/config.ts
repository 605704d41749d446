import * as path from 'path';

/**
 * Runtime settings for the HTTP server, taken from the environment
 */
export interface ServerConfig {
  /** Port to listen on (PORT, default 3000) */
  port: number;

  /** Where export files are written (DATA_DIR, default ./data/exports) */
  dataDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = Number(env.PORT ?? 3000);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${env.PORT}`);
  }

  return {
    port,
    dataDir: env.DATA_DIR || path.join(process.cwd(), 'data', 'exports')
  };
}
