export interface ServerConfig {
  port: number;
  corsOrigin: string;   // '*' allows any origin
}

const DEFAULT_PORT = 8787;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  let port = DEFAULT_PORT;
  if (env.PORT) {
    port = Number(env.PORT);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new Error(`PORT must be an integer between 0 and 65535, got "${env.PORT}"`);
    }
  }

  return {
    port,
    corsOrigin: env.CORS_ORIGIN || '*',
  };
}
