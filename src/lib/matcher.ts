/**
 * Fuzzy ownership matching between a directory name and installed application names.
 *
 * The heuristic is permissive on purpose: it would rather report a folder as
 * owned by something (and keep it) than flag a live folder as an orphan. A
 * "Steam" folder is owned by "Steamworks Common Redistributables" just as much
 * as by "Steam". There is no scoring; any hit counts.
 */

export const TOKEN_DELIMITERS = /[ \-_.]+/;
export const MIN_TOKEN_LENGTH = 4;

export function tokenize(name: string): string[] {
  return name
    .toLowerCase()
    .split(TOKEN_DELIMITERS)
    .filter((t) => t.length >= MIN_TOKEN_LENGTH);
}

function overlaps(a: string, b: string): boolean {
  return a.includes(b) || b.includes(a);
}

/** Blank owners never match; any other owner matches an empty folder name, which it contains. */
export function matches(candidateName: string, ownerName: string): boolean {
  const candidate = candidateName.trim().toLowerCase();
  const owner = ownerName.trim().toLowerCase();
  if (!owner) return false;

  if (overlaps(candidate, owner)) return true;

  const candidateTokens = tokenize(candidate);
  if (candidateTokens.length === 0) return false;
  const ownerTokens = tokenize(owner);

  for (const ct of candidateTokens) {
    for (const ot of ownerTokens) {
      if (overlaps(ct, ot)) return true;
    }
  }
  return false;
}

/**
 * First installed name (in input order) that claims the folder, if any.
 */
export function findOwner(candidateName: string, installedNames: readonly string[]): string | undefined {
  for (const owner of installedNames) {
    if (!owner.trim()) continue;
    if (matches(candidateName, owner)) return owner;
  }
  return undefined;
}
