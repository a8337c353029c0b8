const YOUTUBE_ID = "([A-Za-z0-9_-]{11})";

const EMBED_PATTERN = new RegExp(`youtube(?:-nocookie)?\\.com/embed/${YOUTUBE_ID}`);
const WATCH_PATTERN = new RegExp(`youtube\\.com[^"' ]*[?&]v=${YOUTUBE_ID}`);
const SHORT_PATTERN = new RegExp(`youtu\\.be/${YOUTUBE_ID}`);

/**
 * Finds the first YouTube video id referenced by a string (an iframe src, an inline
 * script, a watch URL).
 * @returns The 11-character id, or null when none is present
 * @example
 * extractYouTubeId('<iframe src="https://www.youtube.com/embed/abcdefghijk?rel=0">')
 * // returns "abcdefghijk"
 */
export function extractYouTubeId(text: string): string | null {
  for (const pattern of [EMBED_PATTERN, WATCH_PATTERN, SHORT_PATTERN]) {
    const match = text.match(pattern);
    if (match) return match[1];
  }
  return null;
}

export function youTubeWatchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export function isYouTubeUrl(url: string): boolean {
  try {
    const { hostname } = new URL(url);
    return (
      hostname === "youtu.be" ||
      hostname === "youtube.com" ||
      hostname.endsWith(".youtube.com")
    );
  } catch {
    return false;
  }
}

/**
 * Drops the site suffix page titles usually carry ("Adding fractions | Some Site").
 */
export function cleanPageTitle(title: string): string {
  return title.split(/\s+\|\s+/)[0].replace(/\s+/g, " ").trim();
}

/**
 * Normalizes free text into a kebab-case identifier.
 * @example
 * slugify("www.Example.org") // returns "www-example-org"
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .normalize("NFD") // Handle accents/special chars
    .replace(/[\u0300-\u036f]/g, "") // Remove accents
    .replace(/[^a-z0-9\s.-]/g, "")
    .trim()
    .replace(/[\s.]+/g, "-")
    .replace(/-+/g, "-");
}
