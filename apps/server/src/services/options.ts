/**
 * Options Store
 *
 * Runtime copy of the aggregate toggles. Seeded from the environment and
 * changed through the options route; pollers react to change events.
 */

import { EventEmitter } from 'node:events';
import { OPTION_KEYS, updateOptionsSchema } from '@marquee/shared';
import type { Options } from '@marquee/shared';
import { ValidationError } from '../utils/errors.js';

export type OptionKey = (typeof OPTION_KEYS)[number];

export interface OptionsChange {
  options: Options;
  changed: OptionKey[];
}

export class OptionsStore extends EventEmitter {
  private current: Options;

  constructor(initial: Options) {
    super();
    this.current = { ...initial };
  }

  get(): Options {
    return { ...this.current };
  }

  isEnabled(key: OptionKey): boolean {
    return this.current[key];
  }

  /**
   * Apply a partial update. Emits `changed` when any toggle flipped.
   *
   * @throws ValidationError on unknown keys or non-boolean values
   */
  update(input: unknown): Options {
    const result = updateOptionsSchema.safeParse(input);
    if (!result.success) {
      throw ValidationError.fromZodError(result.error, 'Invalid options');
    }

    const changed: OptionKey[] = [];
    const next = { ...this.current };
    for (const key of OPTION_KEYS) {
      const value = result.data[key];
      if (value === undefined || value === next[key]) continue;
      next[key] = value;
      changed.push(key);
    }

    this.current = next;
    if (changed.length > 0) {
      const change: OptionsChange = { options: this.get(), changed };
      this.emit('changed', change);
    }
    return this.get();
  }

  onChange(listener: (change: OptionsChange) => void): () => void {
    this.on('changed', listener);
    return () => {
      this.off('changed', listener);
    };
  }
}
