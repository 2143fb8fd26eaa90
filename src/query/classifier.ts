/**
 * classifier.ts - Decides which path a query takes
 *
 * A query mentioning "log" anywhere (case-insensitive) is a log request: the
 * answer is the raw log text of one pod, fetched without asking the model.
 * Everything else is a general cluster question answered by the model from a
 * snapshot.
 *
 * The classification is a tagged union so the router handles both variants
 * exhaustively and each can be tested on its own.
 */

export type ClassifiedQuery =
  | {
      kind: "log";
      text: string;
      /** Pod name extracted from the text, or null when none was found */
      podName: string | null;
    }
  | {
      kind: "general";
      text: string;
    };

/**
 * Pod-name grammar for log requests:
 *
 *   log[s] [for|of|from] [the] [pod] <name>
 *
 * Words are separated by whitespace and matched case-insensitively. <name>
 * starts with a letter or digit and continues with letters, digits, and
 * hyphens, so "log for the pod web-7f8c in the default namespace" yields
 * "web-7f8c" and "show me the logs of web-1" yields "web-1". "log" must start
 * a word: "catalog web" does not match.
 */
const POD_NAME_GRAMMAR =
  /\blogs?\s+(?:(?:for|of|from)\s+)?(?:the\s+)?(?:pod\s+)?([a-z0-9][a-z0-9-]*)/i;

/**
 * Words that are never pod names. They are captured only when the query stops
 * right after a marker ("show the log for the pod") or continues with a
 * location ("logs in the default namespace").
 */
const MARKER_WORDS = new Set(["for", "of", "from", "in", "the", "pod"]);

/**
 * Extracts the pod name from a log request.
 *
 * @returns The pod name as typed, or null when the text has no name after the markers
 */
export function extractPodName(text: string): string | null {
  const match = POD_NAME_GRAMMAR.exec(text);
  if (!match) return null;

  const name = match[1];
  if (MARKER_WORDS.has(name.toLowerCase())) return null;
  return name;
}

/**
 * Classifies a query, evaluating the "log" test exactly once.
 */
export function classifyQuery(text: string): ClassifiedQuery {
  if (text.toLowerCase().includes("log")) {
    return { kind: "log", text, podName: extractPodName(text) };
  }
  return { kind: "general", text };
}
