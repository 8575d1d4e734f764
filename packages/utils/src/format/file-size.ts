/**
 * Human-readable file sizes
 */

/**
 * - bytes: decimal multiples of bytes (1.2 MB)
 * - bits: decimal multiples of bits (9.6 Mb)
 * - ibibytes: binary multiples of bytes (1.2 MiB)
 */
export type FileSizeUnit = "bytes" | "bits" | "ibibytes";

const SUFFIXES: Record<FileSizeUnit, readonly string[]> = {
  bytes: ["B", "KB", "MB", "GB", "TB", "PB", "EB", "ZB"],
  bits: ["b", "Kb", "Mb", "Gb", "Tb", "Pb", "Eb", "Zb"],
  ibibytes: ["iB", "KiB", "MiB", "GiB", "TiB", "PiB", "EiB", "ZiB"],
};

/**
 * Format a byte count, e.g. formatFileSize(1536, 2, "ibibytes") === "1.5 KiB".
 *
 * @param places Decimal places kept after rounding half to even
 */
export function formatFileSize(bytes: number, places = 2, unit: FileSizeUnit = "bytes"): string {
  const suffixes = SUFFIXES[unit];
  const section = unit === "ibibytes" ? 1024 : 1000;
  let size = unit === "bits" ? bytes * 8 : bytes;
  let index = 0;

  while (size >= section && index < suffixes.length - 1) {
    size /= section;
    index++;
  }

  return `${roundHalfToEven(size, places)} ${suffixes[index]}`;
}

/**
 * Round to `places` decimals, ties to the even neighbour (2.5 -> 2, 3.5 -> 4).
 */
export function roundHalfToEven(value: number, places = 0): number {
  const multiplier = 10 ** places;
  const scaled = value * multiplier;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;
  let rounded: number;
  if (fraction > 0.5) {
    rounded = floor + 1;
  } else if (fraction < 0.5) {
    rounded = floor;
  } else {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  }
  return rounded / multiplier;
}
