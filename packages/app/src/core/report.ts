import type { Token } from "./token.js"
import { tokenText } from "./token.js"

// CHANGE: render the token sequence for diagnostics
// WHY: inspecting tokens is the quickest way to see why a document fails to parse
// QUOTE(TZ): n/a
// REF: req-report-1
// SOURCE: n/a
// FORMAT THEOREM: ∀ts: lines(render(ts)) = |ts|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: indices are zero-padded to at least three digits
// COMPLEXITY: O(n)

const formatIndex = (index: number): string => String(index).padStart(3, "0")

const CONTROL = /[\u0000-\u001f]/g

// Control characters inside string content would break the one-line layout.
const printable = (text: string): string =>
  text.replace(CONTROL, (char) => JSON.stringify(char).slice(1, -1))

/**
 * Render one `Token NNN: text` line per token.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderTokenListing = (tokens: ReadonlyArray<Token>): string =>
  tokens.map((token, index) => `Token ${formatIndex(index)}: ${printable(tokenText(token))}`).join("\n")
