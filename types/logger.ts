/** Logger accepted by every component. Hosts pass their own; the console is the default. */
export type TaskStoreLogger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  debug?: (msg: string) => void;
};

export const consoleLogger: TaskStoreLogger = {
  info: (msg) => console.info(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};
