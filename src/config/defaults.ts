export const DEFAULT_RUNTIME_CONFIG = {
  host: "0.0.0.0",
  port: 8000,
  debug: false,
  logsDir: "logs",
  maxLogEntries: 85000,
  defaultIpLimit: 20,
};

export const MAX_IP_LIMIT = 500;
