import type { CaptionKind } from "../catalog/types";
import { JOB_LIMITS } from "../config/jobs";
import { parseWebVtt, type Cue } from "./webvtt";

export interface CaptionTrack {
  language: string;
  kind: CaptionKind;
  /** Raw WebVTT/SRT text */
  content: string;
}

export interface TranscriptSegment {
  index: number;
  start_time: number;
  end_time: number;
  text: string;
}

export type TranscriptResult =
  | {
      kind: "ok";
      segments: TranscriptSegment[];
      fullText: string;
      wordCount: number;
      track: { language: string; kind: CaptionKind };
    }
  | { kind: "no-transcript"; reason: string };

/** Shape of the processed transcript artifact */
export interface TranscriptDocument {
  content_id: string;
  source_id: string;
  segments: TranscriptSegment[];
  full_text: string;
  word_count: number;
}

export function matchesLanguage(trackLanguage: string, preferred: string): boolean {
  const lang = trackLanguage.toLowerCase();
  const want = preferred.toLowerCase();
  return lang === want || lang.startsWith(`${want}-`) || lang.startsWith(`${want}_`);
}

/**
 * Orders tracks by preference: the preferred language (manual before auto), then
 * any manual track, then any auto-generated one.
 */
export function rankTracks<T extends Pick<CaptionTrack, "language" | "kind">>(
  tracks: T[],
  preferredLanguage: string
): T[] {
  const rank = (t: T): number => {
    const inLanguage = matchesLanguage(t.language, preferredLanguage);
    if (inLanguage) return t.kind === "manual" ? 0 : 1;
    return t.kind === "manual" ? 2 : 3;
  };
  return [...tracks].sort((a, b) => rank(a) - rank(b));
}

/**
 * Turns parsed cues into ordered, non-overlapping segments:
 * sort by start, merge consecutive repeats, clip overlaps, drop what is left empty.
 */
export function normalizeCues(cues: Cue[]): TranscriptSegment[] {
  const sorted = cues
    .filter((cue) => cue.text !== "")
    .sort((a, b) => a.start - b.start)
    .map((cue) => ({ ...cue }));

  const merged: Cue[] = [];
  for (const cue of sorted) {
    const prev = merged[merged.length - 1];
    if (prev && prev.text === cue.text) {
      prev.end = Math.max(prev.end, cue.end);
    } else {
      merged.push(cue);
    }
  }

  for (let i = 0; i < merged.length - 1; i++) {
    const next = merged[i + 1];
    if (merged[i].end > next.start) merged[i].end = next.start;
  }

  return merged
    .filter((cue) => cue.end > cue.start)
    .map((cue, index) => ({
      index,
      start_time: cue.start,
      end_time: cue.end,
      text: cue.text
    }));
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export class TranscriptProcessor {
  constructor(
    private preferredLanguage: string = JOB_LIMITS.DEFAULT_CAPTION_LANGUAGE
  ) {}

  /**
   * Picks the best caption track and converts it to segments. Tracks are tried in
   * preference order until one has usable cues; having none is reported, not thrown.
   */
  process(tracks: CaptionTrack[]): TranscriptResult {
    if (tracks.length === 0) {
      return { kind: "no-transcript", reason: "No caption track available" };
    }

    for (const track of rankTracks(tracks, this.preferredLanguage)) {
      const segments = normalizeCues(parseWebVtt(track.content));
      if (segments.length === 0) continue;

      const fullText = segments.map((s) => s.text).join(" ");
      return {
        kind: "ok",
        segments,
        fullText,
        wordCount: countWords(fullText),
        track: { language: track.language, kind: track.kind }
      };
    }

    return {
      kind: "no-transcript",
      reason: `None of ${tracks.length} caption track(s) has a usable cue`
    };
  }
}

export function toTranscriptDocument(
  sourceId: string,
  contentId: string,
  result: Extract<TranscriptResult, { kind: "ok" }>
): TranscriptDocument {
  return {
    content_id: contentId,
    source_id: sourceId,
    segments: result.segments,
    full_text: result.fullText,
    word_count: result.wordCount
  };
}

export function toPlainText(segments: TranscriptSegment[]): string {
  return segments.map((s) => s.text).join("\n");
}
