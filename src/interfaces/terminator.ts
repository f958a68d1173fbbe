/**
 * Ends the process with the given exit status.
 * Loggers call it after writing an emergency message; tests inject one that records the call.
 */
export type Terminator = (code: number) => void;
