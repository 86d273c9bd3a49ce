import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';

export const expandPath = (input: string) => {
  if (!input.startsWith('~')) return input;
  return input.replace(/^~(?=$|\/)/, os.homedir());
};

export const ensureDir = async (input: string) => {
  await fs.mkdir(input, { recursive: true });
};

export const resolveFrom = (base: string | undefined, target: string) => {
  const expanded = expandPath(target);
  if (path.isAbsolute(expanded) || !base) {
    return path.resolve(expanded);
  }
  return path.resolve(expandPath(base), expanded);
};
