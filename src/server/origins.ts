// 'http://localhost:*' style entries become patterns; the rest match exactly
export function toCorsOrigins(allowed: string[]): (string | RegExp)[] {
  return allowed.map(origin => {
    if (!origin.includes('*')) return origin;

    const escaped = origin
      .split('*')
      .map(part => part.replace(/[.+?^${}()|[\]\\/]/g, '\\$&'))
      .join('.*');
    return new RegExp('^' + escaped + '$');
  });
}
