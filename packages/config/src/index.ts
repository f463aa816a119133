export { envSchema, parseEnv } from "./env.js";
export { checkCredentials, requireCredential } from "./credentials.js";
export type { ComponentName, CredentialReport } from "./credentials.js";
