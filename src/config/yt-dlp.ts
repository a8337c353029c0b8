export const COMMON_CONFIG = [
  // Ensures yt-dlp only handles the specific video URL provided,
  // even if that video is part of a playlist or channel.
  "--no-playlist",

  // Keeps stderr limited to real errors so failures can be classified.
  "--no-warnings",

  // Prevents yt-dlp from writing its cache next to the staging directory
  "--no-cache-dir",

  // Identifies the request as coming from a standard web browser.
  "--user-agent",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/143.0.0.0 Safari/537.36",

  // If the server doesn't respond within 30 seconds, the connection is dropped.
  // Prevents a Node process from hanging indefinitely on a dead link.
  "--socket-timeout",
  "30"
];

/**
 * Arguments for a metadata-only call: one JSON document on stdout describing the
 * video, including its manual (`subtitles`) and generated (`automatic_captions`)
 * caption tracks.
 */
export function getInfoArgs(url: string): string[] {
  return [...COMMON_CONFIG, "--dump-single-json", "--skip-download", url];
}

/**
 * Arguments for downloading the media file into the staging directory.
 * @param outputTemplate - yt-dlp output template, e.g. `.staging/src/id/media.%(ext)s`
 * @returns Arguments that print the final file path on stdout once the file is in place
 */
export function getMediaArgs(url: string, outputTemplate: string): string[] {
  return [
    ...COMMON_CONFIG,

    // A single progressive mp4 when there is one, so no merge step is needed.
    "--format",
    "best[ext=mp4]/best",

    "--output",
    outputTemplate,

    // Downloads into "<name>.part" and renames it only once complete, so a killed
    // download never sits under the final name.
    "--part",

    // If a video "fragment" (common in HLS/m3u8 streams) fails to download,
    // yt-dlp will try X more times before giving up.
    "--fragment-retries",
    "10",

    // If a request is rate-limited or fails, wait X seconds before trying again.
    "--retry-sleep",
    "5",

    "--no-progress",

    // Print the path of the finished file, nothing else
    "--print",
    "after_move:filepath",
    url
  ];
}

export function getVersionArgs(): string[] {
  return ["--version"];
}
