/**
 * Call-site attribution for recorded messages.
 *
 * The frame is captured relative to the public method the caller invoked,
 * so internal helper depth never shifts the reported location.
 */

export interface CallSite {
  file: string;
  line: number;
}

export const UNKNOWN_CALL_SITE: Readonly<CallSite> = { file: '???', line: 1 };

// "at fn (/a/b/c.ts:12:5)", "at /a/b/c.ts:12:5", "at file:///a/b/c.ts:12:5"
const FRAME_LOCATION = /^\s*at\s+(?:.*?\()?(.+?):(\d+):\d+\)?$/;

function basename(path: string): string {
  const cut = Math.max(path.lastIndexOf('/'), path.lastIndexOf('\\'));
  return cut >= 0 ? path.slice(cut + 1) : path;
}

function parseFrame(frame: string): CallSite | undefined {
  const match = FRAME_LOCATION.exec(frame);
  if (!match) return undefined;
  const [, path, line] = match;
  if (path === undefined || line === undefined) return undefined;
  return { file: basename(path), line: Number(line) };
}

function isInternalFrame(frame: string): boolean {
  return frame.includes('node_modules') || /\(node:|at node:/.test(frame);
}

/**
 * First user frame of a stack string, skipping the message header,
 * `node:` internals and installed packages.
 */
export function callSiteFromStack(stack: string | undefined): CallSite {
  if (!stack) return UNKNOWN_CALL_SITE;
  for (const frame of stack.split('\n')) {
    if (!frame.trimStart().startsWith('at ') || isInternalFrame(frame)) continue;
    const site = parseFrame(frame);
    if (site) return site;
  }
  return UNKNOWN_CALL_SITE;
}

/**
 * Location of whoever called `entry`.
 */
export function captureCallSite(entry: (...args: never[]) => unknown): CallSite {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, entry);
  return callSiteFromStack(holder.stack);
}

export function decorate(site: CallSite, message: string): string {
  return `${site.file}:${site.line}: ${message}`;
}
