/**
 * Variable Map
 *
 * Mapping of environment variable names to values. On Windows names match
 * case-insensitively: `PATH`, `Path` and `path` are one variable, stored
 * under the spelling it was first set with.
 */

export class VariableMap extends Map<string, string> {
  private readonly caseInsensitive: boolean;
  /** Upper-cased name -> stored spelling */
  private readonly spellings = new Map<string, string>();

  constructor(platform: NodeJS.Platform = process.platform, entries: Iterable<readonly [string, string]> = []) {
    super();
    this.caseInsensitive = platform === 'win32';
    for (const [name, value] of entries) {
      this.set(name, value);
    }
  }

  isCaseInsensitive(): boolean {
    return this.caseInsensitive;
  }

  /**
   * Spelling `name` is stored under, or `name` itself when it is not set
   */
  spellingOf(name: string): string {
    if (!this.caseInsensitive) {
      return name;
    }
    return this.spellings.get(name.toUpperCase()) ?? name;
  }

  get(name: string): string | undefined {
    return super.get(this.spellingOf(name));
  }

  has(name: string): boolean {
    return super.has(this.spellingOf(name));
  }

  set(name: string, value: string): this {
    const key = this.spellingOf(name);
    if (this.caseInsensitive) {
      this.spellings.set(name.toUpperCase(), key);
    }
    return super.set(key, value);
  }

  delete(name: string): boolean {
    const key = this.spellingOf(name);
    if (this.caseInsensitive) {
      this.spellings.delete(name.toUpperCase());
    }
    return super.delete(key);
  }

  clear(): void {
    this.spellings.clear();
    super.clear();
  }
}
