const MAX_BRANCH_LENGTH = 60;

/**
 * Turn free-form feature text typed into the tower into a git branch name
 * that is also usable as a single directory under the worktree area.
 *
 * Returns an empty string when nothing usable remains.
 */
export function sanitizeBranchName(raw: string): string {
  let name = raw
    .trim()
    .toLowerCase()
    .replace(/[\x00-\x1f\x7f]+/g, '')
    // Slashes would nest worktree directories
    .replace(/[\s_/]+/g, '-')
    .replace(/[~^:?*[\]\\@{}<>'"`$!&|;#%,]+/g, '-')
    .replace(/\.{2,}/g, '.')
    .replace(/-{2,}/g, '-');

  name = stripEdges(name);
  if (name.length > MAX_BRANCH_LENGTH) {
    name = stripEdges(name.slice(0, MAX_BRANCH_LENGTH));
  }
  return name;
}

function stripEdges(value: string): string {
  let s = value;
  // `.lock` is reserved by git; strip before trimming dots so `x.lock` → `x`
  while (s.endsWith('.lock')) {
    s = s.slice(0, -5);
  }
  s = s.replace(/^[-.]+|[-.]+$/g, '');
  // trimming may expose another suffix, e.g. `a.lock-`
  return s.endsWith('.lock') ? stripEdges(s) : s;
}
