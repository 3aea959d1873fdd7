import { UI_CONSTANTS } from "../constants/ui.js";

// Short delay lets piped git output drain before exiting
export const exitProcess = (exitCode: number = 0): void => {
  process.exitCode = exitCode;
  setTimeout(() => process.exit(exitCode), UI_CONSTANTS.EXIT_DELAY_MS);
};
