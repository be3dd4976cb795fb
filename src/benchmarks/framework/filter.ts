/**
 * Name composition and filtering for benchmark results
 */

/**
 * `entry/body/size`, the key a result is reported under
 */
export function qualifiedName(entryName: string, bodyName: string, size: number): string {
  return `${entryName}/${bodyName}/${size}`;
}

/**
 * True when there is no filter, or the name contains it (case-sensitive)
 */
export function matchesFilter(name: string, filter?: string): boolean {
  if (filter === undefined) {
    return true;
  }
  return name.includes(filter);
}
