/*
 * Resource Flag System
 * --------------------
 * Boolean options of a resource definition, packed into ResourceSpec.flags
 * at registration time.
 *
 * Memory layout (32-bit integer):
 *   Bit 0: ignoreCache
 *   Bit 1: derived (lock-exempt)
 *   Bit 2: forkSafe
 *   Bit 3: preload
 *   Bit 4: literal (initializer returns a constant)
 *   Bits 5-31: Reserved
 */

/** Every access runs the initializer; nothing is cached. */
export const FLAG_IGNORE_CACHE = 1 << 0;

/** May be instantiated while the container is locked. */
export const FLAG_DERIVED = 1 << 1;

/** Cached value survives a fork untouched. */
export const FLAG_FORK_SAFE = 1 << 2;

/** Included in the eager preload pass. */
export const FLAG_PRELOAD = 1 << 3;

/** Declared with `literal`. */
export const FLAG_LITERAL = 1 << 4;

const OPTION_FLAGS = {
  ignoreCache: FLAG_IGNORE_CACHE,
  derived: FLAG_DERIVED,
  forkSafe: FLAG_FORK_SAFE,
  preload: FLAG_PRELOAD,
} as const;

export type FlagOption = keyof typeof OPTION_FLAGS;

export const FLAG_OPTIONS = Object.keys(OPTION_FLAGS) as FlagOption[];

/**
 * Pack the boolean options into a bitfield.
 */
export function toFlags(options: Partial<Record<FlagOption, boolean>>): number {
  let flags = 0;
  for (const option of FLAG_OPTIONS) {
    if (options[option]) flags |= OPTION_FLAGS[option];
  }
  return flags;
}
