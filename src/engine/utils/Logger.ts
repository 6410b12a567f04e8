// ─────────────────────────────────────────────
//  Logger — tagged console output
// ─────────────────────────────────────────────

export type LogClass = 'system' | 'action' | 'combat' | 'economy' | 'ai' | 'warning' | 'critical';

export interface LogEntry {
  text: string;
  cls: LogClass;
}

type LogSink = (entry: LogEntry) => void;

let enabled = true;
const sinks: LogSink[] = [];

export const Logger = {
  log(text: string, type: LogClass = 'system'): void {
    const entry = { text, cls: type };
    for (const sink of sinks) sink(entry);
    if (!enabled) return;
    const line = `[${type.toUpperCase()}] ${text}`;
    if (type === 'critical') console.error(line);
    else if (type === 'warning') console.warn(line);
    else console.log(line);
  },

  warn(text: string): void {
    Logger.log(text, 'warning');
  },

  setEnabled(on: boolean): void {
    enabled = on;
  },

  /** Extra destination for entries (e.g. a debug overlay). Returns an unsubscribe. */
  addSink(sink: LogSink): () => void {
    sinks.push(sink);
    return () => {
      const idx = sinks.indexOf(sink);
      if (idx !== -1) sinks.splice(idx, 1);
    };
  },
};
