import path from 'node:path';

const EXTENSION_CONTENT_TYPES: Record<string, string> = {
  '.mp3': 'audio/mpeg',
  '.m4a': 'audio/mp4',
  '.aac': 'audio/aac',
  '.ogg': 'audio/ogg',
  '.oga': 'audio/ogg',
  '.opus': 'audio/ogg',
  '.wav': 'audio/wav',
  '.flac': 'audio/flac',
  '.webm': 'audio/webm',
};

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  'audio/mpeg': 'mp3',
  'audio/mp3': 'mp3',
  'audio/mp4': 'm4a',
  'audio/aac': 'aac',
  'audio/ogg': 'ogg',
  'audio/wav': 'wav',
  'audio/x-wav': 'wav',
  'audio/wave': 'wav',
  'audio/flac': 'flac',
  'audio/webm': 'webm',
};

const OCTET_STREAM = 'application/octet-stream';

export function contentTypeForFile(filePath: string): string {
  return EXTENSION_CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? OCTET_STREAM;
}

/**
 * Maps a declared MIME type (parameters ignored) to a file extension.
 */
export function extensionForContentType(contentType: string | undefined): string | undefined {
  if (!contentType) {
    return undefined;
  }
  const base = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  return CONTENT_TYPE_EXTENSIONS[base];
}

/**
 * Declared type first, then the alternates in order, without duplicates.
 */
export function buildContentTypeCandidates(declared: string, alternates: readonly string[]): string[] {
  const candidates: string[] = [];
  for (const raw of [declared, ...alternates]) {
    const candidate = raw.trim();
    if (candidate && !candidates.includes(candidate)) {
      candidates.push(candidate);
    }
  }
  return candidates;
}

export function isBusyFailure(message: string | undefined, patterns: readonly string[]): boolean {
  if (!message) {
    return false;
  }
  const normalized = message.toLowerCase();
  return patterns.some((pattern) => pattern && normalized.includes(pattern.toLowerCase()));
}

/**
 * Whether a player's reported `media_content_id` points at the artifact.
 * Players rewrite URLs (proxying, added query strings), so the filename is enough.
 */
export function isPlayingArtifact(
  reportedRef: string | null | undefined,
  artifact: { url: string; filename: string },
): boolean {
  if (!reportedRef) {
    return false;
  }
  return reportedRef === artifact.url || reportedRef.includes(artifact.filename);
}
