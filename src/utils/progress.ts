/** Line-per-item progress reporter */
export interface Progress {
  tick(): void;
}

/**
 * Report "[label] i/total" on stderr after each item.
 * Disabled reporters do nothing.
 */
export function createProgress(
  total: number,
  label: string,
  enabled: boolean,
  write: (line: string) => void = (line) => console.error(line)
): Progress {
  let done = 0;
  return {
    tick() {
      done++;
      if (enabled) write(`[${label}] ${done}/${total}`);
    },
  };
}
