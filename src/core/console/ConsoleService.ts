export interface ConsoleEntry {
  id: number;
  timestamp: number;
  type: 'info' | 'warning' | 'error' | 'system';
  content: string;
}

type ConsoleListener = (entries: ConsoleEntry[]) => void;

const MAX_ENTRIES = 500;
const TRIMMED_ENTRIES = 400;

/**
 * Engine log channel. Calculations, combination runs and rejected input are
 * recorded here; hosts subscribe to mirror entries into their own UI or logger.
 */
class ConsoleServiceImpl {
  private entries: ConsoleEntry[] = [];
  private listeners = new Set<ConsoleListener>();
  private nextId = 1;

  getEntries(): ConsoleEntry[] {
    return this.entries;
  }

  subscribe(listener: ConsoleListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notify() {
    const snapshot = [...this.entries];
    this.listeners.forEach(fn => fn(snapshot));
  }

  private addEntry(entry: Omit<ConsoleEntry, 'id' | 'timestamp'>) {
    this.entries.push({
      ...entry,
      id: this.nextId++,
      timestamp: Date.now(),
    });
    if (this.entries.length > MAX_ENTRIES) {
      this.entries = this.entries.slice(-TRIMMED_ENTRIES);
    }
    this.notify();
  }

  log(content: string, type: ConsoleEntry['type'] = 'system') {
    this.addEntry({ type, content });
  }

  info(content: string) {
    this.addEntry({ type: 'info', content });
  }

  warn(content: string) {
    this.addEntry({ type: 'warning', content });
  }

  error(content: string) {
    this.addEntry({ type: 'error', content });
  }

  clear() {
    this.entries = [];
    this.nextId = 1;
    this.notify();
  }
}

export const ConsoleService = new ConsoleServiceImpl();
