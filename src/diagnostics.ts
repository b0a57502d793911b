import {Logger} from './util.js';

import type {NodeId} from './dom.js';

export type DiagnosticKind =
  /** a declaration's value couldn't be parsed and was ignored */
  | 'ParseFallback'
  /** a percentage had nothing definite to resolve against */
  | 'UnresolvedDimension'
  /** the measurement provider had no metric, so a fallback was used */
  | 'MissingGlyphMetric'
  /** a selector couldn't be parsed or isn't supported, so its rule was dropped */
  | 'InvalidSelector';

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  node?: NodeId;
}

/**
 * Collects non-fatal problems found while styling, laying out and measuring.
 * Nothing reads these to make decisions; they're only reported to the caller.
 */
export class Diagnostics {
  private seen: Set<string>;
  private list: Diagnostic[];

  constructor() {
    this.seen = new Set();
    this.list = [];
  }

  report(kind: DiagnosticKind, message: string, node?: NodeId) {
    const key = `${kind}\0${message}\0${node ?? ''}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    const diagnostic: Diagnostic = node === undefined ? {kind, message} : {kind, message, node};
    this.list.push(Object.freeze(diagnostic));
  }

  get size() {
    return this.list.length;
  }

  toArray(): readonly Diagnostic[] {
    return Object.freeze(this.list.slice());
  }

  log(log?: Logger) {
    const flush = !log;
    log = log || new Logger();

    for (const diagnostic of this.list) {
      log.bold();
      log.text(diagnostic.kind);
      log.reset();
      if (diagnostic.node !== undefined) {
        log.dim();
        log.text(` (node ${diagnostic.node})`);
        log.reset();
      }
      log.text(`: ${diagnostic.message}\n`);
    }

    if (flush) log.flush();
  }
}
