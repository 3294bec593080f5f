/**
 * Declared key-value configuration with bounded domains.
 * Shared by settings (platform axes) and options (package toggles).
 */

import type { OptionValue } from '../../types/index.js';
import { InvalidValueError } from '../../utils/errors.js';

/** Allowed values of an axis; null accepts any value */
export type AxisDomain<V> = readonly V[] | null;

interface AxisEntry<V> {
  domain: AxisDomain<V>;
  defaultValue?: V;
  current?: V;
}

export class AxisMap<V extends OptionValue> {
  protected readonly entries = new Map<string, AxisEntry<V>>();
  private frozen = false;

  constructor(private readonly kind: string) {}

  declare(axis: string, domain: AxisDomain<V>, defaultValue?: V): this {
    this.assertMutable(axis);
    if (defaultValue !== undefined && !this.inDomain(domain, defaultValue)) {
      throw new InvalidValueError(`${this.kind} ${axis} (default)`, defaultValue, domain ?? undefined);
    }
    this.entries.set(axis, { domain, defaultValue });
    return this;
  }

  set(axis: string, value: V): this {
    this.assertMutable(axis);
    const entry = this.entries.get(axis);
    if (!entry) {
      throw new InvalidValueError(`${this.kind} ${axis} (undeclared)`, value);
    }
    if (!this.inDomain(entry.domain, value)) {
      throw new InvalidValueError(`${this.kind} ${axis}`, value, entry.domain ?? undefined);
    }
    entry.current = value;
    return this;
  }

  /**
   * Remove an axis. Absent axes are ignored.
   */
  remove(axis: string): this {
    this.assertMutable(axis);
    this.entries.delete(axis);
    return this;
  }

  has(axis: string): boolean {
    return this.entries.has(axis);
  }

  get(axis: string): V | undefined {
    const entry = this.entries.get(axis);
    return entry?.current ?? entry?.defaultValue;
  }

  domainOf(axis: string): AxisDomain<V> | undefined {
    return this.entries.get(axis)?.domain;
  }

  /** Declared axis names in declaration order */
  axes(): string[] {
    return Array.from(this.entries.keys());
  }

  /** Axes holding a value (current or default), in declaration order */
  values(): Array<[string, V]> {
    const result: Array<[string, V]> = [];
    for (const axis of this.entries.keys()) {
      const value = this.get(axis);
      if (value !== undefined) {
        result.push([axis, value]);
      }
    }
    return result;
  }

  toRecord(): Record<string, V> {
    return Object.fromEntries(this.values());
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  protected inDomain(domain: AxisDomain<V>, value: V): boolean {
    return domain === null || domain.some(candidate => candidate === value);
  }

  private assertMutable(axis: string): void {
    if (this.frozen) {
      throw new InvalidValueError(`${this.kind} ${axis} (frozen)`, 'mutation after freeze');
    }
  }
}
