/**
 * Scoped stderr logging.
 *
 * stdout is reserved for CLI results and MCP JSON-RPC traffic, so component
 * diagnostics always go to stderr.
 */

export type LogFn = (message: string) => void;

export function createLogger(scope: string): LogFn {
  return (message: string) => {
    const timestamp = new Date().toISOString();
    process.stderr.write(`[${scope} ${timestamp}] ${message}\n`);
  };
}

export const silentLogger: LogFn = () => {};
