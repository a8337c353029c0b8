export interface Cue {
  start: number;
  end: number;
  text: string;
}

const TIMESTAMP = /^(?:(\d+):)?(\d{1,2}):(\d{2})[.,](\d{1,3})$/;

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  lrm: "",
  rlm: ""
};

/**
 * Converts a cue timestamp (`hh:mm:ss.mmm`, `mm:ss.mmm`, or with a comma before the
 * milliseconds) to seconds.
 * @returns Seconds, or null when the text is not a timestamp
 */
export function parseTimestamp(raw: string): number | null {
  const match = raw.trim().match(TIMESTAMP);
  if (!match) return null;

  const [, hours, minutes, seconds, fraction] = match;
  const millis =
    (Number(hours ?? 0) * 3600 + Number(minutes) * 60 + Number(seconds)) * 1000 +
    Number(fraction.padEnd(3, "0"));
  return millis / 1000;
}

/**
 * Strips inline markup (`<c>`, `<v Speaker>`, karaoke timestamps), decodes entities
 * and collapses whitespace.
 */
export function cleanCueText(raw: string): string {
  return raw
    .replace(/<[^>]*>/g, "")
    .replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, name: string) => {
      if (name.startsWith("#x") || name.startsWith("#X")) {
        return String.fromCodePoint(parseInt(name.slice(2), 16));
      }
      if (name.startsWith("#")) {
        return String.fromCodePoint(parseInt(name.slice(1), 10));
      }
      return ENTITIES[name.toLowerCase()] ?? whole;
    })
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Parses a WebVTT (or SRT) document into cues in file order. Header, NOTE, STYLE and
 * REGION blocks, cue identifiers and cue settings are ignored; a block without a
 * valid timing line is skipped.
 */
export function parseWebVtt(content: string): Cue[] {
  const blocks = content
    .replace(/^\uFEFF/, "")
    .replace(/\r\n?/g, "\n")
    .split(/\n[ \t]*\n/);

  const cues: Cue[] = [];

  for (const block of blocks) {
    const lines = block.split("\n").filter((line) => line.trim() !== "");
    if (lines.length === 0) continue;
    if (/^(WEBVTT|NOTE|STYLE|REGION)\b/.test(lines[0])) continue;

    const timingIndex = lines.findIndex((line) => line.includes("-->"));
    if (timingIndex === -1) continue;

    const [startRaw, rest = ""] = lines[timingIndex].split("-->");
    const start = parseTimestamp(startRaw);
    // Anything after the end timestamp is cue settings
    const end = parseTimestamp(rest.trim().split(/\s+/)[0] ?? "");
    if (start === null || end === null) continue;

    cues.push({
      start,
      end,
      text: cleanCueText(lines.slice(timingIndex + 1).join(" "))
    });
  }

  return cues;
}
