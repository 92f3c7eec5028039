/** Reported by the health endpoint. Keep in step with package.json. */
export const APP_VERSION = '0.1.0';
