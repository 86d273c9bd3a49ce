import path from 'node:path';
import { ConfigurationError } from '../shared/errors.js';
import { expandPath, resolveFrom } from '../utils/path.js';

export interface WorkspaceResolverOptions {
  baseDirectory?: string;
  /** Channel name → directory; relative directories live under the base. */
  channelDirs: Record<string, string>;
}

const isInside = (parent: string, child: string) => {
  const relative = path.relative(parent, child);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
};

export class WorkspaceResolver {
  private readonly base?: string;
  private readonly dirs = new Map<string, string>();

  constructor(options: WorkspaceResolverOptions) {
    this.base = options.baseDirectory ? path.resolve(expandPath(options.baseDirectory)) : undefined;

    for (const [channel, target] of Object.entries(options.channelDirs)) {
      const expanded = expandPath(target);
      const resolved = resolveFrom(this.base, expanded);
      // Relative entries must stay under the base; absolute ones are explicit.
      if (this.base && !path.isAbsolute(expanded) && !isInside(this.base, resolved)) {
        throw new ConfigurationError(
          `CHANNEL_DIRS entry for #${channel} escapes BASE_DIRECTORY`,
          'Use a path inside BASE_DIRECTORY or an absolute path.',
        );
      }
      this.dirs.set(channel, resolved);
    }
  }

  /**
   * Directory for a channel. Unmapped channels and direct messages use the
   * base directory; with no base configured they are a configuration error.
   */
  resolve(channelName: string | null): string {
    if (channelName) {
      const mapped = this.dirs.get(channelName);
      if (mapped) return mapped;
    }
    if (this.base) return this.base;

    throw new ConfigurationError(
      channelName ? `no working directory configured for #${channelName}` : 'no working directory configured',
      'Set BASE_DIRECTORY or add the channel to CHANNEL_DIRS.',
    );
  }

  /** Channel whose directory is `directory` or its closest ancestor. */
  channelFor(directory: string): string | null {
    const target = path.resolve(expandPath(directory));
    let best: { channel: string; depth: number } | null = null;
    for (const [channel, dir] of this.dirs) {
      if (!isInside(dir, target)) continue;
      const depth = dir.split(path.sep).length;
      if (!best || depth > best.depth) {
        best = { channel, depth };
      }
    }
    return best ? best.channel : null;
  }

  channels() {
    return Array.from(this.dirs.keys());
  }
}
