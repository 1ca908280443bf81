/**
 * Line-oriented entity walk shared by the procstats, usagestats and
 * batterystats parsers.
 *
 * The walker holds at most one open entity. An `open` line flushes the current
 * entity into the output and opens a new one; a `close` line flushes without
 * opening; end of input flushes whatever is still open.
 */

export type WalkState<E> = { kind: 'idle' } | { kind: 'open'; entity: E };

export type LineAction<E> =
  | { type: 'open'; entity: E }
  | { type: 'close' }
  | { type: 'update'; apply: (entity: E) => void }
  | { type: 'meta'; apply: () => void }
  | { type: 'skip' };

export type LineClassifier<E> = (line: string) => LineAction<E>;

export const SKIP = { type: 'skip' } as const;

/**
 * Walk `lines`, appending finished entities to `out` in the order their opening
 * lines occur. `update` lines with no open entity are ignored.
 */
export function walkEntities<E>(lines: Iterable<string>, classify: LineClassifier<E>, out: E[] = []): E[] {
  let state: WalkState<E> = { kind: 'idle' };

  for (const line of lines) {
    const action = classify(line);
    switch (action.type) {
      case 'open':
        if (state.kind === 'open') out.push(state.entity);
        state = { kind: 'open', entity: action.entity };
        break;
      case 'close':
        if (state.kind === 'open') out.push(state.entity);
        state = { kind: 'idle' };
        break;
      case 'update':
        if (state.kind === 'open') action.apply(state.entity);
        break;
      case 'meta':
        action.apply();
        break;
      case 'skip':
        break;
    }
  }

  if (state.kind === 'open') out.push(state.entity);
  return out;
}

export interface StatRule<S> {
  re: RegExp;
  apply: (stats: S, match: RegExpMatchArray) => void;
}

/** Apply the first rule whose pattern matches `line`. Returns false if none matched. */
export function applyFirstRule<S>(rules: readonly StatRule<S>[], line: string, stats: S): boolean {
  for (const rule of rules) {
    const match = line.match(rule.re);
    if (match) {
      rule.apply(stats, match);
      return true;
    }
  }
  return false;
}
