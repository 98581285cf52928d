/**
 * @fileoverview Issue Log
 *
 * Append-only multi-map from an identifying key (a file path, a problem name,
 * or GENERAL_ISSUE_KEY for run-wide findings) to the messages logged for it.
 * Warnings and errors are stored the same way; the wording carries the severity.
 */

/** Key for findings that concern the whole run rather than one problem. */
export const GENERAL_ISSUE_KEY = '_general_';

/**
 * A single finding produced by a checker, not yet recorded.
 */
export interface Issue {
  key: string;
  message: string;
}

/**
 * Keys that share the prefix before their first `/`, for report sectioning.
 */
export interface IssueSection {
  prefix: string;
  keys: string[];
}

export function issue(key: string, message: string): Issue {
  return { key, message };
}

export function sectionPrefix(key: string): string {
  const slash = key.indexOf('/');
  return slash === -1 ? key : key.slice(0, slash);
}

export class IssueLog {
  private readonly entries = new Map<string, string[]>();

  log(key: string, message: string): void {
    const messages = this.entries.get(key);
    if (messages) {
      messages.push(message);
      return;
    }
    this.entries.set(key, [message]);
  }

  record(issues: readonly Issue[]): void {
    for (const entry of issues) {
      this.log(entry.key, entry.message);
    }
  }

  /** Keys in lexicographic order. */
  allKeys(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** Messages for a key in insertion order; empty for an unknown key. */
  messagesFor(key: string): string[] {
    return [...(this.entries.get(key) ?? [])];
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    let total = 0;
    for (const messages of this.entries.values()) {
      total += messages.length;
    }
    return total;
  }

  sections(): IssueSection[] {
    const sections: IssueSection[] = [];
    for (const key of this.allKeys()) {
      const prefix = sectionPrefix(key);
      const last = sections[sections.length - 1];
      if (last && last.prefix === prefix) {
        last.keys.push(key);
      } else {
        sections.push({ prefix, keys: [key] });
      }
    }
    return sections;
  }

  toJSON(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const key of this.allKeys()) {
      out[key] = this.messagesFor(key);
    }
    return out;
  }
}
