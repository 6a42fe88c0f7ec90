import { existsSync, readFileSync } from 'fs';
import { errorMessage, MissingCredentialsError } from '../errors.js';

/**
 * Outcome of loading the credential pool.
 */
export type PoolLoadResult =
  | {
      success: true;
      pool: CredentialPool;
      /** Entries contributed by the explicit list (before dedup) */
      fromExplicit: number;
      /** Entries contributed by the backing file (before dedup) */
      fromFile: number;
    }
  | { success: false; error: string };

/**
 * Outcome of advancing to the next credential.
 */
export interface RotationResult {
  rotated: boolean;
  previousIndex: number;
  index: number;
  credential: string;
}

/**
 * Show only the last four characters of a credential.
 */
export function maskCredential(credential: string): string {
  return `...${credential.slice(-4)}`;
}

/**
 * Remove duplicates, keeping the first occurrence of each value in order.
 */
export function dedupeCredentials(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const value of values) {
    if (!seen.has(value)) {
      seen.add(value);
      unique.push(value);
    }
  }
  return unique;
}

function cleanEntries(values: readonly string[]): string[] {
  return values.map((value) => value.trim()).filter((value) => value.length > 0);
}

/**
 * Ordered, de-duplicated set of interchangeable credentials with a cyclic cursor.
 */
export class CredentialPool {
  private readonly entries: readonly string[];
  private index = 0;

  constructor(credentials: readonly string[]) {
    const unique = dedupeCredentials(cleanEntries(credentials));
    if (unique.length === 0) {
      throw new MissingCredentialsError();
    }
    this.entries = unique;
  }

  /**
   * Load credentials from an explicit list and a backing file (one per line).
   *
   * A missing file contributes nothing. An empty merged pool is reported as a
   * failed result rather than thrown.
   */
  static load(explicit: readonly string[], filePath?: string): PoolLoadResult {
    const fromExplicit = cleanEntries(explicit);
    let fromFile: string[] = [];

    if (filePath && existsSync(filePath)) {
      try {
        fromFile = cleanEntries(readFileSync(filePath, 'utf8').split(/\r?\n/));
      } catch (error) {
        return {
          success: false,
          error: `Failed to read credential file '${filePath}': ${errorMessage(error)}`,
        };
      }
    }

    const merged = [...fromExplicit, ...fromFile];
    if (merged.length === 0) {
      return { success: false, error: new MissingCredentialsError().message };
    }

    return {
      success: true,
      pool: new CredentialPool(merged),
      fromExplicit: fromExplicit.length,
      fromFile: fromFile.length,
    };
  }

  get size(): number {
    return this.entries.length;
  }

  get currentIndex(): number {
    return this.index;
  }

  get credentials(): readonly string[] {
    return [...this.entries];
  }

  current(): string {
    const credential = this.entries[this.index];
    if (credential === undefined) {
      throw new RangeError(`Credential index ${this.index} out of range`);
    }
    return credential;
  }

  /**
   * Move to the next credential, wrapping around. A pool of one cannot rotate.
   */
  advance(): RotationResult {
    const previousIndex = this.index;
    if (this.entries.length <= 1) {
      return { rotated: false, previousIndex, index: previousIndex, credential: this.current() };
    }
    this.index = (this.index + 1) % this.entries.length;
    return { rotated: true, previousIndex, index: this.index, credential: this.current() };
  }

  /**
   * Point the cursor back at `index`, e.g. after a rotation whose bind failed.
   */
  restore(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
      throw new RangeError(`Credential index ${index} out of range (size ${this.entries.length})`);
    }
    this.index = index;
  }
}
