import {RenderItem} from './layout-box.js';
import {Logger, loggableText} from './util.js';

import type {FormattingBox, BoxArea, MeasureContext} from './layout-box.js';
import type {Style, WhiteSpace} from './style.js';
import type {LoggerOptions, TreeLogOptions} from './util.js';
import type {Measurer} from './text-measure.js';
import type {Inline, IfcInline, InlineLevel} from './layout-flow.js';

// Widths are sums of many fractional advances
const EPSILON = 1e-7;

function isWsCollapsible(whiteSpace: WhiteSpace) {
  return whiteSpace === 'normal' || whiteSpace === 'nowrap' || whiteSpace === 'pre-line';
}

function isNowrap(whiteSpace: WhiteSpace) {
  return whiteSpace === 'nowrap' || whiteSpace === 'pre';
}

export function isSpaceOrTabOrNewline(c: string) {
  return c === ' ' || c === '\t' || c === '\n';
}

function isSpaceOrTab(c: string) {
  return c === ' ' || c === '\t';
}

function isNewline(c: string) {
  return c === '\n';
}

export class Run extends RenderItem {
  public start: number;
  public end: number;

  constructor(start: number, end: number, style: Style) {
    super(style);
    this.start = start;
    this.end = end;
  }

  get length() {
    return this.end - this.start;
  }

  getLogSymbol() {
    return 'Ͳ';
  }

  get wsCollapsible() {
    return isWsCollapsible(this.style.whiteSpace);
  }

  isRun(): this is Run {
    return true;
  }

  logName(log: Logger, options?: TreeLogOptions) {
    log.text(`${this.start},${this.end}`);
    if (options?.paragraphText) {
      log.text(` "${loggableText(options.paragraphText.slice(this.start, this.end))}"`);
    }
  }
}

/**
 * CSS Text 3 § 4.1.1 phase I. Rewrites the IFC's text and adjusts the offsets
 * of runs and inlines. Runs that become empty are removed.
 */
export function collapseWhitespace(ifc: IfcInline) {
  const stack: (InlineLevel | {post: Inline})[] = ifc.children.slice().reverse();
  const parents: Inline[] = [ifc];
  let str = '';
  let delta = 0;
  let inWhitespace = false;

  while (stack.length) {
    const item = stack.pop();
    if (!item) break;

    if ('post' in item) {
      const inline = item.post;
      inline.end -= delta;
      parents.pop();
    } else if (item.isInline()) {
      item.start -= delta;
      parents.push(item);
      stack.push({post: item});
      for (let i = item.children.length - 1; i >= 0; --i) stack.push(item.children[i]);
    } else if (item.isRun()) {
      const whiteSpace = item.style.whiteSpace;
      const originalStart = item.start;

      item.start -= delta;

      if (whiteSpace === 'normal' || whiteSpace === 'nowrap') {
        for (let i = originalStart; i < item.end; i++) {
          const isWhitespace = isSpaceOrTabOrNewline(ifc.text[i]);

          if (inWhitespace && isWhitespace) {
            delta += 1;
          } else {
            str += isWhitespace ? ' ' : ifc.text[i];
          }

          inWhitespace = isWhitespace;
        }
      } else if (whiteSpace === 'pre-line') {
        for (let i = originalStart; i < item.end; i++) {
          const isWhitespace = isSpaceOrTabOrNewline(ifc.text[i]);

          if (isWhitespace) {
            let j = i + 1;
            let hasNewline = isNewline(ifc.text[i]);

            for (; j < item.end && isSpaceOrTabOrNewline(ifc.text[j]); j++) {
              hasNewline = hasNewline || isNewline(ifc.text[j]);
            }

            while (i < j) {
              if (isSpaceOrTab(ifc.text[i])) {
                if (inWhitespace || hasNewline) {
                  delta += 1;
                } else {
                  str += ' ';
                }
                inWhitespace = true;
              } else { // newline
                str += '\n';
                inWhitespace = false;
              }

              i++;
            }

            i = j - 1;
          } else {
            str += ifc.text[i];
            inWhitespace = false;
          }
        }
      } else { // pre, pre-wrap
        inWhitespace = false;
        str += ifc.text.slice(originalStart, item.end);
      }

      item.end -= delta;

      if (item.length === 0) {
        const parent = parents.at(-1);
        const i = parent ? parent.children.indexOf(item) : -1;
        if (!parent || i < 0) throw new Error('Assertion failed');
        parent.children.splice(i, 1);
      }
    } else if (item.isFormattingBox() && !item.isOutOfFlow()) { // atomic inline
      inWhitespace = false;
    }
  }

  ifc.text = str;
  ifc.end = str.length;
}

/**
 * Used vertical metrics of a font at a style's line-height
 */
export interface InlineMetrics {
  ascent: number;
  descent: number;
  lineHeight: number;
}

export function getMetrics(style: Style, measurer: Measurer): InlineMetrics {
  const {ascent, descent, recommendedLineHeight} = measurer.lineMetrics(style.getFont());
  return {ascent, descent, lineHeight: style.getLineHeight(recommendedLineHeight)};
}

interface TokenBase {
  /** Inline ancestors, outermost first */
  inlines: Inline[];
}

interface WordToken extends TokenBase {
  type: 'word';
  text: string;
  style: Style;
  width: number;
  metrics: InlineMetrics;
}

interface SpaceToken extends TokenBase {
  type: 'space';
  text: string;
  style: Style;
  width: number;
  metrics: InlineMetrics;
  collapsible: boolean;
  breakable: boolean;
}

interface BreakToken extends TokenBase {
  type: 'break';
}

interface AtomicToken extends TokenBase {
  type: 'atomic';
  box: FormattingBox;
  width: number;
  metrics: InlineMetrics;
  breakable: boolean;
}

interface AnchorToken extends TokenBase {
  type: 'anchor';
  box: FormattingBox;
}

interface EdgeToken extends TokenBase {
  type: 'open' | 'close';
  inline: Inline;
  /** margin, border and padding on this side */
  width: number;
  metrics: InlineMetrics;
}

export type Token = WordToken | SpaceToken | BreakToken | AtomicToken | AnchorToken | EdgeToken;

export interface TextFragment {
  kind: 'word' | 'space';
  text: string;
  style: Style;
  x: number;
  /** y of the baseline */
  y: number;
  width: number;
  ascent: number;
  descent: number;
  /** inline ancestors inside the IFC, outermost first */
  inlines: Inline[];
}

/**
 * One rectangle of an inline element on one line. The rectangle is the border
 * box: the font's ascent plus descent, extended by padding and border.
 */
export interface BackgroundBox {
  inline: Inline;
  linebox: Linebox;
  x: number;
  y: number;
  width: number;
  height: number;
  /** the inline's first fragment, which gets the left border and padding */
  naturalStart: boolean;
  /** the inline's last fragment, which gets the right border and padding */
  naturalEnd: boolean;
}

export class Linebox {
  tokens: Token[];
  /** offset from the IFC's content box after text-align */
  x: number;
  y: number;
  /** width of the content, not counting trailing spaces */
  width: number;
  height: number;
  /** distance from the top of the line to its baseline */
  baseline: number;
  fragments: TextFragment[];
  endsWithBreak: boolean;

  constructor() {
    this.tokens = [];
    this.x = 0;
    this.y = 0;
    this.width = 0;
    this.height = 0;
    this.baseline = 0;
    this.fragments = [];
    this.endsWithBreak = false;
  }

  /**
   * Non-whitespace text, atomic inlines, preserved spaces or inline edges
   * with width
   */
  hasContent() {
    for (const token of this.tokens) {
      if (token.type === 'word' || token.type === 'atomic') return true;
      if (token.type === 'space' && !token.collapsible) return true;
      if ((token.type === 'open' || token.type === 'close') && token.width > 0) return true;
    }
    return false;
  }

  push(token: Token) {
    if (token.type === 'space' && token.collapsible && !this.hasContent()) return;
    this.tokens.push(token);
    if ('width' in token) this.width += token.width;
  }

  /**
   * Height is enough for every token's half-leading box aligned on one
   * baseline (CSS2.2 § 10.8.1)
   */
  finish(strut: InlineMetrics) {
    let above = 0;
    let below = 0;
    let any = false;

    for (const token of this.tokens) {
      if ('metrics' in token) {
        const {ascent, descent, lineHeight} = token.metrics;
        const halfLeading = (lineHeight - (ascent + descent)) / 2;
        above = Math.max(above, ascent + halfLeading);
        below = Math.max(below, descent + halfLeading);
        any = true;
      }
    }

    if (!any) {
      const halfLeading = (strut.lineHeight - (strut.ascent + strut.descent)) / 2;
      above = strut.ascent + halfLeading;
      below = strut.descent + halfLeading;
    }

    this.baseline = above;
    this.height = Math.max(0, above + below);
  }

  text() {
    return this.fragments.map(f => f.text).join('');
  }
}

export interface TextLayoutContext extends MeasureContext {
  /**
   * 'max-content' measures atomic inlines by their contribution and only
   * needs line widths
   */
  mode: 'normal' | 'max-content';
  /**
   * Lays out an atomic inline so its border area and margins are known
   */
  layoutAtomic(box: FormattingBox): void;
}

export class Paragraph {
  ifc: IfcInline;
  lineboxes: Linebox[];
  backgroundBoxes: Map<Inline, BackgroundBox[]>;
  height: number;

  constructor(ifc: IfcInline) {
    this.ifc = ifc;
    this.lineboxes = [];
    this.backgroundBoxes = new Map();
    this.height = 0;
  }

  string(start: number, end: number) {
    return this.ifc.text.slice(start, end);
  }

  tokenize(ctx: TextLayoutContext): Token[] {
    const {measurer} = ctx;
    const tokens: Token[] = [];
    const metricsCache = new Map<Style, InlineMetrics>();
    const metricsOf = (style: Style) => {
      let metrics = metricsCache.get(style);
      if (!metrics) metricsCache.set(style, metrics = getMetrics(style, measurer));
      return metrics;
    };
    const stack: (InlineLevel | {post: Inline})[] = this.ifc.children.slice().reverse();
    const parents: Inline[] = [];

    while (stack.length) {
      const item = stack.pop();
      if (!item) break;

      if ('post' in item) {
        const inline = item.post;
        tokens.push({
          type: 'close',
          inline,
          width: inline.getLineRightMarginBorderPadding(),
          metrics: metricsOf(inline.style),
          inlines: parents.slice()
        });
        parents.pop();
      } else if (item.isInline()) {
        parents.push(item);
        tokens.push({
          type: 'open',
          inline: item,
          width: item.getLineLeftMarginBorderPadding(),
          metrics: metricsOf(item.style),
          inlines: parents.slice()
        });
        stack.push({post: item});
        for (let i = item.children.length - 1; i >= 0; --i) stack.push(item.children[i]);
      } else if (item.isRun()) {
        const style = item.style;
        const font = style.getFont();
        const metrics = metricsOf(style);
        const collapsible = isWsCollapsible(style.whiteSpace);
        const breakable = !isNowrap(style.whiteSpace);
        const inlines = parents.slice();
        const text = this.string(item.start, item.end);

        for (const [piece] of text.matchAll(/\n|\t| +|[^ \t\n]+/g)) {
          if (piece === '\n') {
            tokens.push({type: 'break', inlines});
          } else if (piece === '\t') {
            const width = style.getTabSize(measurer.spaceAdvance(font));
            tokens.push({type: 'space', text: piece, style, width, metrics, collapsible, breakable, inlines});
          } else if (piece[0] === ' ') {
            const width = piece.length * measurer.spaceAdvance(font);
            tokens.push({type: 'space', text: piece, style, width, metrics, collapsible, breakable, inlines});
          } else {
            const width = measurer.wordAdvance(font, piece);
            tokens.push({type: 'word', text: piece, style, width, metrics, inlines});
          }
        }
      } else if (item.isBreak()) {
        tokens.push({type: 'break', inlines: parents.slice()});
      } else if (item.isFormattingBox()) {
        const parent = parents.at(-1) ?? this.ifc;
        if (item.isOutOfFlow()) {
          tokens.push({type: 'anchor', box: item, inlines: parents.slice()});
        } else if (ctx.mode === 'max-content') {
          const width = item.contribution(ctx);
          const metrics = {ascent: 0, descent: 0, lineHeight: 0};
          const breakable = !isNowrap(parent.style.whiteSpace);
          tokens.push({type: 'atomic', box: item, width, metrics, breakable, inlines: parents.slice()});
        } else {
          ctx.layoutAtomic(item);
          const width = item.getMarginBoxWidth();
          const height = item.getMarginBoxHeight();
          // The baseline of an atomic inline is its bottom margin edge
          const metrics = {ascent: height, descent: 0, lineHeight: height};
          const breakable = !isNowrap(parent.style.whiteSpace);
          tokens.push({type: 'atomic', box: item, width, metrics, breakable, inlines: parents.slice()});
        }
      }
    }

    return tokens;
  }

  /**
   * Greedy line breaking. Break opportunities are breakable spaces, forced
   * breaks, and either side of an atomic inline. Everything between two
   * opportunities is one unbreakable unit, even across element boundaries.
   */
  createLineboxes(width: number, ctx: TextLayoutContext, dangling: FormattingBox[] = []) {
    const tokens = this.tokenize(ctx);
    const strut = getMetrics(this.ifc.style, ctx.measurer);
    const lines: Linebox[] = [];
    let line = new Linebox();
    let unit: Token[] = [];
    let unitWidth = 0;
    let unitHasContent = false;
    let spaces: SpaceToken[] = [];

    const finishLine = () => {
      line.finish(strut);
      lines.push(line);
      line = new Linebox();
    };

    const flush = () => {
      if (!unit.length) return;

      const lineHasContent = line.hasContent();
      let spacesWidth = 0;
      for (const space of spaces) {
        if (lineHasContent || !space.collapsible) spacesWidth += space.width;
      }

      if (
        lineHasContent &&
        unitHasContent &&
        line.width + spacesWidth + unitWidth > width + EPSILON
      ) {
        // Spaces at a soft wrap are removed
        spaces = [];
        finishLine();
      }

      for (const space of spaces) line.push(space);
      for (const token of unit) line.push(token);
      spaces = [];
      unit = [];
      unitWidth = 0;
      unitHasContent = false;
    };

    const addToUnit = (token: Token) => {
      unit.push(token);
      if ('width' in token) unitWidth += token.width;
      if (token.type !== 'open' && token.type !== 'close' && token.type !== 'anchor') {
        unitHasContent = true;
      } else if (token.type !== 'anchor' && token.width > 0) {
        unitHasContent = true;
      }
    };

    for (const token of tokens) {
      if (token.type === 'space') {
        if (token.breakable) {
          flush();
          spaces.push(token);
        } else {
          addToUnit(token);
        }
      } else if (token.type === 'break') {
        flush();
        for (const space of spaces) if (!space.collapsible) line.push(space);
        spaces = [];
        line.push(token);
        line.endsWithBreak = true;
        finishLine();
      } else if (token.type === 'atomic' && token.breakable) {
        flush();
        addToUnit(token);
        flush();
      } else if ((token.type === 'close' || token.type === 'anchor') && !unit.length && !spaces.length) {
        // Belongs with what came before
        line.push(token);
      } else {
        addToUnit(token);
      }
    }

    flush();

    // A last line with nothing visible has no height (CSS2.2 § 9.4.2)
    if (line.hasContent()) {
      finishLine();
    } else {
      for (const token of line.tokens) if (token.type === 'anchor') dangling.push(token.box);
    }

    return lines;
  }

  /**
   * Width of the widest line when nothing wraps except forced breaks
   */
  maxContent(ctx: TextLayoutContext) {
    let max = 0;
    for (const line of this.createLineboxes(Infinity, {...ctx, mode: 'max-content'})) {
      max = Math.max(max, line.width);
    }
    return max;
  }

  /**
   * Breaks lines at `width` and positions everything on them relative to the
   * IFC's content box. `containerArea` is where atomic inlines and static
   * positions are placed.
   */
  layout(width: number, containerArea: BoxArea, ctx: TextLayoutContext) {
    const dangling: FormattingBox[] = [];
    this.lineboxes = this.createLineboxes(width, ctx, dangling);
    this.backgroundBoxes = new Map();
    this.positionItems(width, containerArea, ctx.measurer);

    for (const box of dangling) {
      box.staticPosition = {area: containerArea, x: 0, y: this.height};
    }

    if (this.ifc.loggingEnabled()) this.logLines(ctx.log);
  }

  positionItems(width: number, containerArea: BoxArea, measurer: Measurer) {
    const align = this.ifc.style.getTextAlign();
    const open: {inline: Inline, x: number, naturalStart: boolean}[] = [];
    let y = 0;

    const shiftOf = (inlines: Inline[]) => {
      let x = 0;
      let y = 0;
      for (const inline of inlines) {
        x += inline.relativeOffset.x;
        y += inline.relativeOffset.y;
      }
      return {x, y};
    };

    const addBackgroundBox = (
      linebox: Linebox,
      inline: Inline,
      start: number,
      end: number,
      naturalStart: boolean,
      naturalEnd: boolean
    ) => {
      const {ascent, descent} = getMetrics(inline.style, measurer);
      const top = inline.style.getBorderTopWidth() + inline.getPaddingTop();
      const bottom = inline.style.getBorderBottomWidth() + inline.getPaddingBottom();
      const shift = shiftOf(this.ancestorsOf(inline));
      const box: BackgroundBox = {
        inline,
        linebox,
        x: start + shift.x,
        y: linebox.y + linebox.baseline - ascent - top + shift.y,
        width: end - start,
        height: top + ascent + descent + bottom,
        naturalStart,
        naturalEnd
      };
      const list = this.backgroundBoxes.get(inline);
      if (list) {
        list.push(box);
      } else {
        this.backgroundBoxes.set(inline, [box]);
      }
    };

    for (const linebox of this.lineboxes) {
      const free = Math.max(0, width - linebox.width);
      let x = align === 'right' ? free : align === 'center' ? free / 2 : 0;

      if (!Number.isFinite(x)) x = 0;

      linebox.x = x;
      linebox.y = y;

      // Inlines continuing from the previous line start at the line's edge
      for (const o of open) o.x = x;

      const baseline = y + linebox.baseline;

      for (const token of linebox.tokens) {
        if (token.type === 'word' || token.type === 'space') {
          const shift = shiftOf(token.inlines);
          linebox.fragments.push({
            kind: token.type,
            text: token.text,
            style: token.style,
            x: x + shift.x,
            y: baseline + shift.y,
            width: token.width,
            ascent: token.metrics.ascent,
            descent: token.metrics.descent,
            inlines: token.inlines
          });
          x += token.width;
        } else if (token.type === 'atomic') {
          const box = token.box;
          const shift = shiftOf(token.inlines);
          box.setInlinePosition(x + box.margin.left + shift.x);
          box.setBlockPosition(baseline - token.metrics.ascent + box.margin.top + shift.y);
          x += token.width;
        } else if (token.type === 'anchor') {
          token.box.staticPosition = {area: containerArea, x, y};
        } else if (token.type === 'open') {
          const inline = token.inline;
          const margin = inline.getMarginsAutoIsZero().left;
          open.push({inline, x: x + margin, naturalStart: true});
          x += token.width;
        } else if (token.type === 'close') {
          const inline = token.inline;
          const margin = inline.getMarginsAutoIsZero().right;
          const i = open.findIndex(o => o.inline === inline);
          x += token.width;
          if (i >= 0) {
            const [o] = open.splice(i, 1);
            addBackgroundBox(linebox, inline, o.x, x - margin, o.naturalStart, true);
          }
        }
      }

      for (const o of open) {
        addBackgroundBox(linebox, o.inline, o.x, x, o.naturalStart, false);
        o.naturalStart = false;
      }

      y += linebox.height;
    }

    this.height = y;
  }

  /**
   * Baseline of the first line, relative to the IFC's content box
   */
  getFirstBaseline() {
    const first = this.lineboxes[0];
    if (first) return first.y + first.baseline;
  }

  ancestorsOf(inline: Inline): Inline[] {
    const chain: Inline[] = [];
    const visit = (parent: Inline): boolean => {
      for (const child of parent.children) {
        if (child.isInline()) {
          chain.push(child);
          if (child === inline || visit(child)) return true;
          chain.pop();
        }
      }
      return false;
    };
    visit(this.ifc);
    return chain;
  }

  logLines(options?: LoggerOptions) {
    const log = new Logger(options);
    log.text(`Paragraph ${this.ifc.id}:\n`);
    log.pushIndent();
    for (const [i, line] of this.lineboxes.entries()) {
      const W = line.width.toFixed(2);
      const H = line.height.toFixed(2);
      const B = line.baseline.toFixed(2);
      const Y = line.y.toFixed(2);
      log.text(`Line ${i} (W:${W} H:${H} B:${B} Y:${Y}): `);
      for (const fragment of line.fragments) {
        if (fragment.kind === 'word') log.text(`“${loggableText(fragment.text)}” `);
      }
      if (line.endsWithBreak) log.text('⏎');
      log.text('\n');
    }
    log.popIndent();
    log.flush();
  }
}
