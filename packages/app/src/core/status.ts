export type SyncStatusClass = "Blank" | "InProgress" | "Done" | "Other"

export type StatusMatcher = (status: string) => boolean

export interface StatusMatchers {
  readonly done: StatusMatcher
  readonly inProgress: StatusMatcher
}

export const defaultDonePattern = "(always )?available on this device"

export const defaultInProgressPattern =
  "(sync pending|pending|syncing|sync in progress|uploading|downloading)( \\(\\d{1,3}%\\))?"

/**
 * Compiles a user pattern into an anchored, case-insensitive matcher.
 *
 * @param pattern - Regular expression source without anchors.
 * @returns Matcher over trimmed status strings.
 *
 * @pure true
 * @invariant matcher(s) implies the whole of s matches pattern
 * @throws SyntaxError when pattern is not a valid regular expression
 */
// CHANGE: anchor configured patterns so a status matches only as a whole string
// WHY: a longer status containing the Done text is not Done
// SOURCE: n/a
// FORMAT THEOREM: forall p, s: matcher(p)(s) -> fullMatch(p, trim(s))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: "available on this device, but" does not match the default Done pattern
// COMPLEXITY: O(|pattern|)/O(|pattern|)
export const matcherFromPattern = (pattern: string): StatusMatcher => {
  const expression = new RegExp(`^(?:${pattern})$`, "i")
  return (status) => expression.test(status.trim())
}

export const defaultStatusMatchers: StatusMatchers = {
  done: matcherFromPattern(defaultDonePattern),
  inProgress: matcherFromPattern(defaultInProgressPattern)
}

/**
 * Maps a raw oracle status to its stability class.
 *
 * @param rawStatus - Status string as returned by the oracle.
 * @param matchers - Done and InProgress predicates.
 * @returns Blank for empty input, Done/InProgress on match, Other otherwise.
 *
 * @pure true
 * @invariant Done is checked before InProgress
 * @complexity O(|rawStatus|)
 */
// CHANGE: classify statuses with caller-supplied predicates
// WHY: status wording differs between sync clients and locales
// SOURCE: n/a
// FORMAT THEOREM: forall s: classify(s) in {Blank, Done, InProgress, Other}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: trim(raw) = "" -> Blank
// COMPLEXITY: O(n)/O(1)
export const classifyStatus = (
  rawStatus: string,
  matchers: StatusMatchers
): SyncStatusClass => {
  const trimmed = rawStatus.trim()
  if (trimmed.length === 0) {
    return "Blank"
  }
  if (matchers.done(trimmed)) {
    return "Done"
  }
  if (matchers.inProgress(trimmed)) {
    return "InProgress"
  }
  return "Other"
}

const statusFieldNames: ReadonlyArray<string> = ["availability status", "status"]

/**
 * Finds the position of the availability-status field in a header row.
 *
 * @param fieldNames - Header names, index-aligned with field positions.
 * @returns Index of the first preferred name present, or -1.
 *
 * @pure true
 * @invariant "Availability status" wins over a plain "Status" column
 */
// CHANGE: discover the status column by header name instead of a fixed position
// WHY: the column position differs between shell versions
// SOURCE: n/a
// FORMAT THEOREM: forall ns: find(ns) >= 0 -> statusName(ns[find(ns)])
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: result = -1 or normalize(fieldNames[result]) in statusFieldNames
// COMPLEXITY: O(n)/O(1)
export const findStatusFieldIndex = (fieldNames: ReadonlyArray<string>): number => {
  const normalized = fieldNames.map((name) => name.trim().toLowerCase())
  for (const wanted of statusFieldNames) {
    const index = normalized.indexOf(wanted)
    if (index >= 0) {
      return index
    }
  }
  return -1
}
