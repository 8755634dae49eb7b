// "mp3_44100_128" -> { format: "mp3", contentType: "audio/mpeg" }
const CONTENT_TYPES: Record<string, string> = {
  mp3: "audio/mpeg",
  opus: "audio/opus",
  aac: "audio/aac",
  flac: "audio/flac",
  wav: "audio/wav",
  pcm: "audio/pcm",
  ulaw: "audio/basic",
};

export function describeFormat(outputFormat: string) {
  const format = outputFormat.split("_")[0] || "mp3";
  return { format, contentType: CONTENT_TYPES[format] ?? "application/octet-stream" };
}
