import type { Query, SearchKind } from "./types.ts";

/** Build a query from a line of user input, or `null` when nothing is left to search for. */
export function parseQuery(kind: SearchKind, input: string): Query | null {
  switch (kind) {
    case "subject": {
      const term = input.trim().toLowerCase();
      return term ? { kind, term } : null;
    }
    case "tags": {
      const terms = [
        ...new Set(
          input
            .split(",")
            .map((t) => t.trim().toLowerCase())
            .filter(Boolean)
        ),
      ];
      return terms.length > 0 ? { kind, terms } : null;
    }
    case "date": {
      const term = input.trim().toLowerCase();
      return term ? { kind, term } : null;
    }
  }
}

export function describeQuery(query: Query): string {
  switch (query.kind) {
    case "subject":
      return `Subject: ${query.term}`;
    case "tags":
      return `Tags: ${query.terms.join(", ")}`;
    case "date":
      return `Date: ${query.term}`;
  }
}
