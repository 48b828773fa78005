import path from "node:path";
import { env } from "./env.js";

export type { Env } from "./env.js";
export { envSchema, parseEnv, loadModeEnvFile } from "./env.js";

export type Config = Readonly<typeof env>;
export const config: Config = Object.freeze({ ...env });

export const resolveDataPath = (fileName: string, dataDir: string = config.DATA_DIR): string => {
  const directory = path.isAbsolute(dataDir) ? dataDir : path.resolve(process.cwd(), dataDir);
  return path.join(directory, fileName);
};
