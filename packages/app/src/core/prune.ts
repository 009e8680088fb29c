import { Array as Arr, Order } from "effect"

export interface PruneBoundary {
  readonly root: string
  readonly isStrictlyInside: (candidate: string) => boolean
}

/**
 * Bundles the root boundary with a pure "strictly inside" predicate.
 *
 * @param root - Normalized absolute root that must never be deleted.
 * @param isStrictlyInside - True only for paths below root, never root itself.
 *
 * @pure true
 */
// CHANGE: keep path normalization in SHELL and boundary reasoning in CORE
// WHY: path flavour belongs to the platform layer
// SOURCE: n/a
// FORMAT THEOREM: forall c: inside(c) -> c != root
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: isStrictlyInside(root) = false
// COMPLEXITY: O(1)/O(1)
export const buildPruneBoundary = (
  root: string,
  isStrictlyInside: (candidate: string) => boolean
): PruneBoundary => ({
  root,
  isStrictlyInside: (candidate) => candidate !== root && isStrictlyInside(candidate)
})

export const segmentDepth = (pathValue: string): number =>
  pathValue.split(/[\\/]+/).filter((segment) => segment.length > 0).length

const byDepthDescending: Order.Order<string> = Order.reverse(
  Order.mapInput(Order.number, segmentDepth)
)

const deepestFirst: Order.Order<string> = Order.combine(
  byDepthDescending,
  Order.reverse(Order.string)
)

/**
 * Orders directories so that every child precedes its parent.
 *
 * @pure true
 * @invariant depth(result[i]) >= depth(result[i + 1])
 * @complexity O(n log n)
 */
// CHANGE: sort by segment count rather than by reversed path text
// WHY: children must be removed before their parents
// SOURCE: n/a
// FORMAT THEOREM: forall a, b: parent(b) = a -> index(b) < index(a)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: forall a, b: parent(b) = a -> index(b) < index(a)
// COMPLEXITY: O(n log n)/O(n)
export const orderDeepestFirst = (
  directories: ReadonlyArray<string>
): ReadonlyArray<string> => Arr.sort(directories, deepestFirst)

/**
 * Lists the ancestors of scope that lie strictly inside the boundary,
 * nearest first.
 *
 * @param scope - Directory whose parents are walked.
 * @param boundary - Root boundary.
 * @param dirname - Parent resolver for the host path flavour.
 *
 * @pure true
 * @invariant result never contains boundary.root nor any path outside it
 */
// CHANGE: precompute the upward walk so the shell only checks and removes
// WHY: the walk must never reach the root
// SOURCE: n/a
// FORMAT THEOREM: forall a in result: strictlyInside(root, a)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: walk stops at the first non-inside ancestor or at a filesystem root
// COMPLEXITY: O(d)/O(d)
export const ancestorsWithinBoundary = (
  scope: string,
  boundary: PruneBoundary,
  dirname: (pathValue: string) => string
): ReadonlyArray<string> => {
  const result: Array<string> = []
  let current = scope
  let parent = dirname(current)
  while (parent !== current && boundary.isStrictlyInside(parent)) {
    result.push(parent)
    current = parent
    parent = dirname(current)
  }
  return result
}
