/**
 * Status messages for the user.
 *
 * Notifications never affect control flow. `debug` messages are dropped unless the
 * notifier was created with `debug: true`.
 */
export type NotifySeverity = 'info' | 'warning' | 'error' | 'debug';

export type Notifier = (message: string, severity: NotifySeverity) => void;

/**
 * Write `[severity] message` lines to a stream (stderr for the CLI).
 */
export function createStreamNotifier(
  stream: NodeJS.WritableStream,
  options: { debug: boolean }
): Notifier {
  return (message, severity) => {
    if (severity === 'debug' && !options.debug) return;
    stream.write(`[${severity}] ${message}\n`);
  };
}

/**
 * Collect notifications in memory (used by the MCP tools to return them).
 */
export function createCollectingNotifier(options: { debug: boolean }): {
  notify: Notifier;
  messages: { severity: NotifySeverity; message: string }[];
} {
  const messages: { severity: NotifySeverity; message: string }[] = [];
  return {
    messages,
    notify: (message, severity) => {
      if (severity === 'debug' && !options.debug) return;
      messages.push({ severity, message });
    },
  };
}
