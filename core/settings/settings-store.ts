/**
 * Key-value store the host application persists between runs (encrypted at rest on the host side).
 * The core only ever writes the token keys listed in SETTINGS_KEYS.
 */
export interface SettingsStore {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
  remove(key: string): void;
}

/**
 * Process-local settings store, used for headless runs and tests
 */
export class InMemorySettingsStore implements SettingsStore {
  private readonly values = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    Object.entries(initial).forEach(([key, value]) => this.values.set(key, value));
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  set(key: string, value: string): void {
    this.values.set(key, value);
  }

  remove(key: string): void {
    this.values.delete(key);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  get size(): number {
    return this.values.size;
  }
}
