/** Format a token count with k/M suffixes for readability. */
export function formatTokens(count: number): string {
  if (count >= 1_000_000) return `${(count / 1_000_000).toFixed(1)}M tok`;
  if (count >= 1_000) return `${(count / 1_000).toFixed(1)}k tok`;
  return `${count} tok`;
}

/** Shortens a model id to fit a column, keeping the end. */
export function fitModel(model: string, width: number): string {
  if (model.length <= width) return model.padEnd(width);
  return `…${model.slice(model.length - width + 1)}`;
}

/** Elapsed time as `12s` or `2m 05s`. */
export function formatElapsed(ms: number): string {
  const seconds = Math.max(0, Math.floor(ms / 1000));
  if (seconds < 60) return `${seconds}s`;
  return `${Math.floor(seconds / 60)}m ${String(seconds % 60).padStart(2, '0')}s`;
}
