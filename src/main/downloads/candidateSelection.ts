import type { CandidateFile, CandidateSelector } from '../../types/download';

/**
 * Picks the most recently modified candidate. Equal mtimes keep listing
 * order, so the first one listed wins; with several concurrent writers this
 * can pick the wrong file.
 */
export const selectMostRecent: CandidateSelector = (candidates) =>
  candidates.reduce<CandidateFile | null>(
    (best, candidate) => (best === null || candidate.mtimeMs > best.mtimeMs ? candidate : best),
    null,
  );

/**
 * Prefers candidates whose extension is in `extensions` and falls back to
 * `fallback` over the whole set when none match.
 */
export const selectByExtension = (
  extensions: readonly string[],
  fallback: CandidateSelector = selectMostRecent,
): CandidateSelector => {
  const wanted = extensions.map((extension) =>
    (extension.startsWith('.') ? extension : `.${extension}`).toLowerCase(),
  );
  return (candidates) => {
    const matching = candidates.filter((candidate) =>
      wanted.some((extension) => candidate.name.toLowerCase().endsWith(extension)),
    );
    return fallback(matching.length > 0 ? matching : candidates);
  };
};
