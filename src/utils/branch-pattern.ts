export function parseBranchPatterns(patternSet: string): string[] {
  return patternSet
    .split(",")
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.+?^${}()|[\]\\]/g, "\\$&");
}

export function matchesPattern(branchName: string, pattern: string): boolean {
  if (pattern.includes("*")) {
    const regex = new RegExp("^" + pattern.split("*").map(escapeRegExp).join(".*") + "$");
    return regex.test(branchName);
  }
  return branchName === pattern;
}

/**
 * Checks a branch name against a comma-separated pattern set such as
 * `main,feature/*,release/*`. `*` matches any run of characters and the whole
 * name must match.
 */
export function matchesBranchPattern(branchName: string, patternSet: string): boolean {
  return parseBranchPatterns(patternSet).some((pattern) => matchesPattern(branchName, pattern));
}
