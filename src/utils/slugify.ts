/**
 * Convert a string to a URL-safe slug. Accented letters are folded to ASCII
 * ("Café" becomes "cafe"); anything else outside [a-z0-9_-] is dropped.
 */
export function slugify(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '') // Strip combining marks
    .toLowerCase()
    .trim()
    .replace(/[^\w\s-]/g, '') // Remove non-word chars
    .replace(/[\s_-]+/g, '-') // Replace spaces, underscores, hyphens with single hyphen
    .replace(/^-+|-+$/g, ''); // Remove leading/trailing hyphens
}

/**
 * First candidate of `base`, `base-1`, `base-2`, ... for which `isTaken`
 * resolves false.
 */
export async function uniqueSlug(base: string, isTaken: (slug: string) => Promise<boolean>): Promise<string> {
  let candidate = base;
  let counter = 1;
  while (await isTaken(candidate)) {
    candidate = `${base}-${counter}`;
    counter++;
  }
  return candidate;
}
