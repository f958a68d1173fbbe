import type { Terminator } from "../interfaces/terminator.js";

/** Exit status after an emergency message (the `-1` failure status as seen by the OS). */
export const EMERGENCY_EXIT_CODE = 255;

/** Exit the current process immediately. */
export const terminateProcess: Terminator = (code) => {
  process.exit(code);
};
