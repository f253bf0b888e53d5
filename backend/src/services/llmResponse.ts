/**
 * Tolerant JSON extraction for model output.
 *
 * Replies may wrap JSON in code fences or commentary. Candidates are tried in
 * order: every fenced segment, then the whole reply; within a candidate the
 * full text first, then a balanced `{...}` / `[...]` region starting at each
 * opening bracket. The first candidate that parses wins.
 */

export type LlmParseResult =
    | { kind: "ok"; value: unknown }
    | { kind: "malformed" }
    | { kind: "empty" };

const CODE_FENCE = /```(?:json)?\s*([\s\S]*?)```/gi;

function jsonCandidates(raw: string): string[] {
    const candidates: string[] = [];
    for (const match of raw.matchAll(CODE_FENCE)) {
        const cleaned = match[1].trim();
        if (cleaned) {
            candidates.push(cleaned);
        }
    }

    const stripped = raw.trim();
    if (stripped) {
        candidates.push(stripped);
    }
    return candidates;
}

/**
 * Index just past the bracket that closes the one at `start`, or -1.
 */
function findBalancedEnd(text: string, start: number): number {
    const stack: string[] = [];
    let inString = false;
    let escaped = false;

    for (let index = start; index < text.length; index += 1) {
        const char = text[index];

        if (inString) {
            if (escaped) {
                escaped = false;
            } else if (char === "\\") {
                escaped = true;
            } else if (char === '"') {
                inString = false;
            }
            continue;
        }

        if (char === '"') {
            inString = true;
        } else if (char === "{" || char === "[") {
            stack.push(char === "{" ? "}" : "]");
        } else if (char === "}" || char === "]") {
            if (stack.pop() !== char) {
                return -1;
            }
            if (stack.length === 0) {
                return index + 1;
            }
        }
    }
    return -1;
}

function tryParse(text: string): { parsed: true; value: unknown } | { parsed: false } {
    try {
        return { parsed: true, value: JSON.parse(text) };
    } catch {
        return { parsed: false };
    }
}

function parseCandidate(candidate: string): { parsed: true; value: unknown } | { parsed: false } {
    const whole = tryParse(candidate);
    if (whole.parsed) {
        return whole;
    }

    for (let index = 0; index < candidate.length; index += 1) {
        const char = candidate[index];
        if (char !== "{" && char !== "[") {
            continue;
        }
        const end = findBalancedEnd(candidate, index);
        if (end === -1) {
            continue;
        }
        const region = tryParse(candidate.slice(index, end));
        if (region.parsed) {
            return region;
        }
    }
    return { parsed: false };
}

export function parseJsonResponse(raw: string): LlmParseResult {
    if (!raw || !raw.trim()) {
        return { kind: "empty" };
    }

    for (const candidate of jsonCandidates(raw)) {
        const result = parseCandidate(candidate);
        if (result.parsed) {
            return { kind: "ok", value: result.value };
        }
    }
    return { kind: "malformed" };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}
