import { lightColors } from "./colors.js";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const isDebugEnabled = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const value = env.DEBUG?.toLowerCase();
  return value === "true" || value === "1";
};

export const consoleLogger: Logger = {
  debug: (message: string): void => {
    if (isDebugEnabled()) {
      console.error(lightColors.gray(`DEBUG ${message}`));
    }
  },
  info: (message: string): void => {
    console.log(message);
  },
  warn: (message: string): void => {
    console.error(lightColors.yellow(`⚠️  ${message}`));
  },
  error: (message: string): void => {
    console.error(lightColors.red(`❌ ${message}`));
  },
};

// Used by tests and by callers that must stay quiet
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
