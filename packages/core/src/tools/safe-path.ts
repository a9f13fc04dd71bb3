/**
 * Path scoping for file tools
 */

import { isAbsolute, relative, resolve, sep } from 'path';

/** Resolve `path` against `cwd`, refusing anything that lands outside it */
export function safePath(cwd: string, path: string): string {
  const root = resolve(cwd);
  const resolved = resolve(root, path);
  const rel = relative(root, resolved);
  if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new Error(`Path escapes workspace: ${path}`);
  }
  return resolved;
}

/** First `limit` UTF-16 units of `text`, one fewer when the cut would split a surrogate pair */
export function clipText(text: string, limit: number): string {
  if (text.length <= limit) return text;
  const last = text.charCodeAt(limit - 1);
  const end = limit > 0 && last >= 0xd800 && last <= 0xdbff ? limit - 1 : limit;
  return text.slice(0, end);
}

/** Clip text to `limit` characters, noting how much was dropped */
export function clipOutput(text: string, limit: number): string {
  if (text.length <= limit) return text;
  return clipText(text, limit) + `\n... (truncated ${text.length - limit} characters)`;
}
