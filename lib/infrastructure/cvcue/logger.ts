/**
 * Optional logger hook. Each level is optional; missing levels are silent.
 */
export interface CvCueLogger {
  info?: (message: string) => void;
  warn?: (message: string) => void;
  error?: (message: string) => void;
}

/**
 * Console logger that tags every line with a component prefix, e.g. "[CV-CUE HTTP]"
 */
export function createConsoleLogger(prefix: string): Required<CvCueLogger> {
  return {
    info: (message) => console.log(`[${prefix}] ${message}`),
    warn: (message) => console.warn(`[${prefix}] ${message}`),
    error: (message) => console.error(`[${prefix}] ${message}`),
  };
}
