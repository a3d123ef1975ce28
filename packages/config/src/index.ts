export { envSchema, parseEnv, requireProviderCredential } from "./env.js";
