export const DEFAULT_DOWNLOAD_FILENAME = "tutorial.md";

const PATH_SEPARATOR = /[\\/]/;

/** A bare file name: no directory parts, not `.` or `..`. */
export function isSafeFilename(value: string): boolean {
  const trimmed = value.trim();
  return Boolean(trimmed) && !PATH_SEPARATOR.test(trimmed) && trimmed !== "." && trimmed !== "..";
}

export function resolveFilename(requested?: string | null, fromConfig?: string | null): string {
  return requested?.trim() || fromConfig?.trim() || DEFAULT_DOWNLOAD_FILENAME;
}

/** RFC 5987 form so non-ASCII names survive: `attachment; filename*=UTF-8''<encoded>`. */
export function contentDisposition(filename: string): string {
  return `attachment; filename*=UTF-8''${encodeURIComponent(filename)}`;
}
