// JSON selector parsing: `column->key->list[0]` into a base column and path.

export type JsonPathSegment =
  | Readonly<{ kind: "key"; key: string }>
  | Readonly<{ kind: "index"; index: number }>;

export type JsonSelector = Readonly<{
  /** The base column, possibly table-qualified (`users.data`) */
  column: string;
  path: readonly JsonPathSegment[];
}>;

const JSON_ARROW = "->";
const TRAILING_INDEXES = /^(.*?)((?:\[-?\d+\])+)$/;
const INDEX = /\[(-?\d+)\]/g;

export function isJsonSelector(value: string): boolean {
  return value.includes(JSON_ARROW);
}

function parseSegment(segment: string): JsonPathSegment[] {
  const match = TRAILING_INDEXES.exec(segment);
  if (!match) {
    return [{ kind: "key", key: segment }];
  }

  const key = match[1] ?? "";
  const indexes = match[2] ?? "";
  const parsed: JsonPathSegment[] = key === "" ? [] : [{ kind: "key", key }];
  for (const index of indexes.matchAll(INDEX)) {
    parsed.push({ kind: "index", index: Number(index[1]) });
  }
  return parsed;
}

/**
 * Parses an arrow selector.
 *
 * @example
 * parseJsonSelector("meta->tags[0]->name")
 * // { column: "meta", path: [key tags, index 0, key name] }
 */
export function parseJsonSelector(value: string): JsonSelector {
  const [column = "", ...segments] = value.split(JSON_ARROW);
  return {
    column,
    path: segments.flatMap((segment) => parseSegment(segment)),
  };
}

/**
 * Renders a selector back to arrow syntax.
 */
export function formatJsonSelector(selector: JsonSelector): string {
  let text = selector.column;
  for (const [position, segment] of selector.path.entries()) {
    if (segment.kind === "key") {
      text += `${JSON_ARROW}${segment.key}`;
    } else {
      text += `${position === 0 ? JSON_ARROW : ""}[${segment.index}]`;
    }
  }
  return text;
}

/**
 * Splits off the last path segment, e.g. to test for a key's presence.
 */
export function splitLastSegment(
  selector: JsonSelector,
): readonly [JsonSelector, JsonPathSegment | undefined] {
  const last = selector.path.at(-1);
  return [{ column: selector.column, path: selector.path.slice(0, -1) }, last];
}
