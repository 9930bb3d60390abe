/**
 * ASCII Art Mascot
 *
 * Two crabs: the full one sits beside the complete fact list, the small one
 * is used in minimal mode. The SVG crab in assets/ is the raster version of
 * the full one.
 */

export type MascotSize = 'full' | 'small';

// Every row is padded to the same width so the text column lines up.
const CRAB_FULL: readonly string[] = [
  String.raw`        _~^~^~_        `,
  String.raw`    \) /  o o  \ (/    `,
  String.raw`      '_   -   _'      `,
  String.raw`      / '-----' \      `,
  String.raw`     /           \     `,
  String.raw`    /  /       \  \    `,
  String.raw`   (  |         |  )   `,
  String.raw`    \_|         |_/    `,
];

const CRAB_SMALL: readonly string[] = [
  String.raw`   _~^~_   `,
  String.raw` \)/o o\(/ `,
  String.raw`  '- ^ -'  `,
];

export function getMascotArt(size: MascotSize): readonly string[] {
  return size === 'small' ? CRAB_SMALL : CRAB_FULL;
}

/**
 * Widest row of an art block, counted in characters.
 */
export function artWidth(art: readonly string[]): number {
  return art.reduce((max, line) => Math.max(max, [...line].length), 0);
}
