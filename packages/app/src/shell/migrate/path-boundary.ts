import type * as Path from "@effect/platform/Path"

/**
 * True when candidate lies below root, never for root itself.
 *
 * @pure true
 * @invariant isStrictlyInside(p, r, r) = false
 */
// CHANGE: single containment check shared by CLI validation and pruning
// WHY: both callers must agree on what "inside the source root" means
// SOURCE: n/a
// FORMAT THEOREM: forall r, c: isStrictlyInside(r, c) -> relative(r, c) has no leading ".."
// PURITY: SHELL
// EFFECT: n/a
// INVARIANT: sibling names sharing a prefix ("/data" vs "/data-cloud") are outside
// COMPLEXITY: O(|root| + |candidate|)/O(1)
export const isStrictlyInside = (path: Path.Path, root: string, candidate: string): boolean => {
  const relative = path.relative(root, candidate)
  return relative !== "" &&
    relative !== ".." &&
    !relative.startsWith(`..${path.sep}`) &&
    !path.isAbsolute(relative)
}

export const isSameOrInside = (path: Path.Path, root: string, candidate: string): boolean =>
  path.relative(root, candidate) === "" || isStrictlyInside(path, root, candidate)
