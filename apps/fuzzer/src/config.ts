import { loadConfig, type Config } from "@vecdiff/config";

export const config = loadConfig();
export type { Config };
