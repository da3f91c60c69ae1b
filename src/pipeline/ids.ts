const ID_RE = /^[a-zA-Z0-9_-]{6,}$/;

export function toVideoId(videoOrUrl: string): string {
  const v = videoOrUrl.trim();
  // watch?v=ID, youtu.be/ID and /shorts/ID all map to the bare id
  const urlMatch = v.match(/[?&]v=([a-zA-Z0-9_-]{6,})/);
  if (urlMatch) return urlMatch[1];
  const short = v.match(/youtu\.be\/([a-zA-Z0-9_-]{6,})/);
  if (short) return short[1];
  const shorts = v.match(/\/shorts\/([a-zA-Z0-9_-]{6,})/);
  if (shorts) return shorts[1];
  return v;
}

/** Video ids become directory and file names; reject anything path-like. */
export function isSafeVideoId(id: string): boolean {
  return ID_RE.test(id);
}
