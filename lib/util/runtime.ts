/**
 * The errno-style code of an error thrown by Node, if any
 */
export function errorCode(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e) {
    const code = e.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : `${e}`;
}

/**
 * Turn an arbitrary string into something that is safe to use as a file name
 */
export function slugify(x: string) {
  return x.replace(/[^a-zA-Z0-9._-]/g, '-');
}
