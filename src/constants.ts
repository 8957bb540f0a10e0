export const SERVER_NAME = "access-log-insight";
export const SERVER_VERSION = "0.1.0";
