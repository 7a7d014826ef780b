/** Suffixes browsers and download managers use for unfinished transfers. */
export const PARTIAL_DOWNLOAD_SUFFIXES = [
  '.crdownload',
  '.part',
  '.tmp',
  '.torrent',
  '.download',
  '.inprogress',
] as const;

export const isPartialDownload = (
  name: string,
  suffixes: readonly string[] = PARTIAL_DOWNLOAD_SUFFIXES,
) => {
  const lower = name.toLowerCase();
  return suffixes.some((suffix) => lower.endsWith(suffix.toLowerCase()));
};
