function escapeRegExp(value: string): string {
  return value.replace(/[.+^${}()|[\]\\]/g, '\\$&');
}

function compilePattern(pattern: string): RegExp {
  const source = escapeRegExp(pattern.trim()).replace(/\*/g, '.*').replace(/\?/g, '.');
  return new RegExp(`^${source}$`);
}

/**
 * Decides which extensions are monitored. Entries are exact extensions or
 * `*`/`?` wildcards (`1*`, `10?`). No entries means every extension.
 */
export class ExtensionMatcher {
  private exact = new Set<string>();
  private patterns: RegExp[] = [];
  private monitorAll = true;

  constructor(extensions: readonly string[] = [], monitorAll?: boolean) {
    this.update(extensions, monitorAll);
  }

  public update(extensions: readonly string[], monitorAll?: boolean): void {
    const exact = new Set<string>();
    const patterns: RegExp[] = [];

    for (const raw of extensions) {
      const entry = raw.trim();
      if (!entry) {
        continue;
      }
      if (entry.includes('*') || entry.includes('?')) {
        patterns.push(compilePattern(entry));
      } else {
        exact.add(entry);
      }
    }

    this.exact = exact;
    this.patterns = patterns;
    this.monitorAll = monitorAll ?? (exact.size === 0 && patterns.length === 0);
  }

  public get monitorsAll(): boolean {
    return this.monitorAll;
  }

  public matches(extension: string | undefined): boolean {
    if (!extension) {
      return false;
    }
    if (this.monitorAll || this.exact.has(extension)) {
      return true;
    }
    return this.patterns.some((pattern) => pattern.test(extension));
  }

  public describe(): { monitorAll: boolean; extensions: string[]; patterns: string[] } {
    return {
      monitorAll: this.monitorAll,
      extensions: Array.from(this.exact),
      patterns: this.patterns.map((pattern) => pattern.source),
    };
  }
}
