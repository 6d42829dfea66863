/**
 * Lower-case ASCII slug: accents stripped, anything but letters, digits,
 * spaces and hyphens dropped, runs of whitespace/hyphens collapsed.
 */
export function slugify(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, '')
    .trim()
    .replace(/[\s-]+/g, '-');
}
