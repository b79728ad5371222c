export type AddressDiff = {
  /** In `current` but not in `previous`. */
  added: string[];
  /** In `previous` but not in `current`. */
  gone: string[];
};

export function diffAddresses(previous: Iterable<string>, current: Iterable<string>): AddressDiff {
  const before = new Set(previous);
  const after = new Set(current);
  return {
    added: [...after].filter((address) => !before.has(address)),
    gone: [...before].filter((address) => !after.has(address)),
  };
}
