export interface HttpServerConfig {
  port: number;
  host: string;
  enableDnsRebindingProtection: boolean;
  allowedHosts: string[];
}

export const DEFAULT_HTTP_PORT = 3000;

export function getHttpServerConfig(env: NodeJS.ProcessEnv = process.env): HttpServerConfig {
  let port = DEFAULT_HTTP_PORT;
  if (env.PORT) {
    const parsed = parseInt(env.PORT, 10);
    if (Number.isInteger(parsed) && parsed >= 0 && parsed < 65536) {
      port = parsed;
    } else {
      console.error(`Invalid PORT environment variable, using default port ${DEFAULT_HTTP_PORT}.`);
    }
  }

  return {
    port,
    host: env.HOST || "localhost",
    // off unless asked for; set DNS_REBINDING_PROTECTION=true when binding locally
    enableDnsRebindingProtection: env.DNS_REBINDING_PROTECTION === "true",
    allowedHosts: env.DNS_REBINDING_ALLOWED_HOST ? [env.DNS_REBINDING_ALLOWED_HOST] : ["127.0.0.1"],
  };
}
