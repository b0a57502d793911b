import {Logger} from './util.js';
import {NO_NODE} from './dom.js';

import type {NodeId} from './dom.js';
import type {Diagnostics} from './diagnostics.js';
import type {Measurer} from './text-measure.js';
import type {Style, Percentage} from './style.js';
import type {LoggerOptions, TreeLogOptions} from './util.js';
import type {Run} from './layout-text.js';
import type {Break, Inline, IfcInline, BlockContainer} from './layout-flow.js';
import type {ReplacedBox} from './layout-image.js';

export abstract class RenderItem {
  public style: Style;

  constructor(style: Style) {
    this.style = style;
  }

  isBlockContainer(): this is BlockContainer {
    return false;
  }

  isFormattingBox(): this is FormattingBox {
    return false;
  }

  isReplacedBox(): this is ReplacedBox {
    return false;
  }

  isRun(): this is Run {
    return false;
  }

  isInline(): this is Inline {
    return false;
  }

  isBreak(): this is Break {
    return false;
  }

  isIfcInline(): this is IfcInline {
    return false;
  }

  isBox(): this is Box {
    return false;
  }

  abstract logName(log: Logger, options?: TreeLogOptions): void;

  abstract getLogSymbol(): string;

  log(options?: TreeLogOptions, log?: Logger) {
    const flush = !log;

    log ||= new Logger();

    if (this.isIfcInline()) {
      options = {...options};
      options.paragraphText = this.text;
    }

    log.text(`${this.getLogSymbol()} `);
    this.logName(log, options);

    if (options?.containingBlocks && this.isBox()) {
      log.text(` (cb: ${this.containingBlock.box?.id ?? 'icb'})`);
    }

    if (options?.css) {
      const css = this.style[options.css];
      log.text(` (${options.css}: ${JSON.stringify(css)})`);
    }

    log.text('\n');

    if (this.isBlockContainer() || this.isInline()) {
      log.pushIndent();

      for (const child of this.children) {
        child.log(options, log);
      }

      log.popIndent();
    }

    if (flush) log.flush();
  }
}

/**
 * What intrinsic sizing needs from a layout
 */
export interface MeasureContext {
  measurer: Measurer;
  diagnostics: Diagnostics;
  /** where boxes with logging enabled write to */
  log?: LoggerOptions;
}

/**
 * Adjoining margins: the largest positive margin plus the most negative one
 * (CSS2.2 § 8.3.1)
 */
export class MarginCollapseCollection {
  private positive: number;
  private negative: number;

  constructor(initialMargin: number = 0) {
    this.positive = 0;
    this.negative = 0;
    this.add(initialMargin);
  }

  add(margin: number) {
    if (margin < 0) {
      this.negative = Math.max(this.negative, -margin);
    } else {
      this.positive = Math.max(this.positive, margin);
    }
    return this;
  }

  addCollection(c: MarginCollapseCollection) {
    this.positive = Math.max(this.positive, c.positive);
    this.negative = Math.max(this.negative, c.negative);
    return this;
  }

  get() {
    return this.positive - this.negative;
  }

  clone() {
    const c = new MarginCollapseCollection();
    c.positive = this.positive;
    c.negative = this.negative;
    return c;
  }
}

export function resolvePercent(value: number | Percentage, base: number) {
  return typeof value === 'number' ? value : value.value / 100 * base;
}

export interface Offsets {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export abstract class Box extends RenderItem {
  /**
   * Assigned in tree order after box generation, so the same document always
   * gets the same ids
   */
  public id: string;
  /** The element that generated this box, NO_NODE for anonymous boxes */
  public node: NodeId;
  public bitfield: number;
  public containingBlock: BoxArea;
  /**
   * Shift from position: relative, applied after layout
   */
  public relativeOffset: {x: number, y: number};

  static BITS = {
    isAnonymous:   1 << 0,
    enableLogging: 1 << 1,
    // BlockContainer only:
    isInline:      1 << 2,
    isBfcRoot:     1 << 3
  };

  /**
   * Use this, not BITS, for the ctor! BITS are ~private
   */
  static ATTRS = {
    isAnonymous: Box.BITS.isAnonymous,
    enableLogging: Box.BITS.enableLogging
  };

  constructor(style: Style, node: NodeId, attrs: number) {
    super(style);
    this.id = '';
    this.node = node;
    this.bitfield = attrs;
    this.containingBlock = EmptyContainingBlock;
    this.relativeOffset = {x: 0, y: 0};
  }

  isBox(): this is Box {
    return true;
  }

  isAnonymous() {
    return Boolean(this.bitfield & Box.BITS.isAnonymous) || this.node === NO_NODE;
  }

  loggingEnabled() {
    return Boolean(this.bitfield & Box.BITS.enableLogging);
  }

  isPositioned() {
    return this.style.isPositioned();
  }

  isStackingContextRoot() {
    return this.style.isStackingContext();
  }

  // Percentages of paddings and margins refer to the containing block's width,
  // even the vertical ones (CSS2.2 § 8.3, § 8.4)

  getPaddingTop() {
    return resolvePercent(this.style.paddingTop, this.containingBlock.width);
  }

  getPaddingRight() {
    return resolvePercent(this.style.paddingRight, this.containingBlock.width);
  }

  getPaddingBottom() {
    return resolvePercent(this.style.paddingBottom, this.containingBlock.width);
  }

  getPaddingLeft() {
    return resolvePercent(this.style.paddingLeft, this.containingBlock.width);
  }

  getMarginTop(): number | 'auto' {
    const margin = this.style.marginTop;
    return margin === 'auto' ? margin : resolvePercent(margin, this.containingBlock.width);
  }

  getMarginRight(): number | 'auto' {
    const margin = this.style.marginRight;
    return margin === 'auto' ? margin : resolvePercent(margin, this.containingBlock.width);
  }

  getMarginBottom(): number | 'auto' {
    const margin = this.style.marginBottom;
    return margin === 'auto' ? margin : resolvePercent(margin, this.containingBlock.width);
  }

  getMarginLeft(): number | 'auto' {
    const margin = this.style.marginLeft;
    return margin === 'auto' ? margin : resolvePercent(margin, this.containingBlock.width);
  }

  getMarginsAutoIsZero(): Offsets {
    const top = this.getMarginTop();
    const right = this.getMarginRight();
    const bottom = this.getMarginBottom();
    const left = this.getMarginLeft();

    return {
      top: top === 'auto' ? 0 : top,
      right: right === 'auto' ? 0 : right,
      bottom: bottom === 'auto' ? 0 : bottom,
      left: left === 'auto' ? 0 : left
    };
  }

  /**
   * Width of margin, border and padding on the left side, as used on a line
   */
  getLineLeftMarginBorderPadding() {
    return this.getMarginsAutoIsZero().left + this.style.getBorderLeftWidth() + this.getPaddingLeft();
  }

  getLineRightMarginBorderPadding() {
    return this.getMarginsAutoIsZero().right + this.style.getBorderRightWidth() + this.getPaddingRight();
  }

  /**
   * CSS2.2 § 9.4.3. Percentages of top and bottom need a definite containing
   * block height; without one they're treated as auto.
   */
  getRelativeVerticalShift(cbHeight: number | undefined, onUnresolved: () => void) {
    const {top, bottom} = this.style;

    if (top !== 'auto') {
      if (typeof top === 'number') return top;
      if (cbHeight !== undefined) return cbHeight * top.value / 100;
      onUnresolved();
    }

    if (bottom !== 'auto') {
      if (typeof bottom === 'number') return -bottom;
      if (cbHeight !== undefined) return -cbHeight * bottom.value / 100;
      onUnresolved();
    }

    return 0;
  }

  getRelativeHorizontalShift() {
    const width = this.containingBlock.width;
    const {right, left} = this.style;

    if (left !== 'auto') {
      return resolvePercent(left, width);
    } else if (right !== 'auto') {
      return -resolvePercent(right, width);
    } else {
      return 0;
    }
  }

  logName(log: Logger, _options?: TreeLogOptions) {
    log.text('Box');
  }

  getLogSymbol() {
    return '◼︎';
  }
}

/**
 * Base class for BlockContainer and ReplacedBox, and the place to add flex and
 * grid containers. Subclasses can establish their own independent formatting
 * contexts whereas Inlines cannot.
 */
export abstract class FormattingBox extends Box {
  public borderArea: BoxArea;
  public paddingArea: BoxArea;
  public contentArea: BoxArea;
  /**
   * Used margins, after auto margins and over-constraint are resolved
   */
  public margin: Offsets;
  /**
   * Where the box would have been in normal flow. Only set on absolutely and
   * fixed positioned boxes.
   */
  public staticPosition: {area: BoxArea, x: number, y: number} | undefined;
  /**
   * Margins adjoining the top border edge: the box's own top margin and any
   * that collapsed into it from its first children
   */
  public collapsedTop: MarginCollapseCollection;
  public collapsedBottom: MarginCollapseCollection;
  /**
   * The top and bottom margins adjoin (CSS2.2 § 8.3.1), so collapsedTop and
   * collapsedBottom are the same collection
   */
  public collapsesThrough: boolean;

  static ATTRS = {...Box.ATTRS};

  constructor(style: Style, node: NodeId, attrs: number) {
    super(style, node, attrs);
    this.borderArea = new BoxArea(this);
    this.paddingArea = new BoxArea(this);
    this.contentArea = new BoxArea(this);
    this.paddingArea.setParent(this.borderArea);
    this.contentArea.setParent(this.paddingArea);
    this.margin = {top: 0, right: 0, bottom: 0, left: 0};
    this.staticPosition = undefined;
    this.collapsedTop = new MarginCollapseCollection();
    this.collapsedBottom = new MarginCollapseCollection();
    this.collapsesThrough = false;
  }

  isFormattingBox(): this is FormattingBox {
    return true;
  }

  isOutOfFlow() {
    return this.style.isOutOfFlow();
  }

  isInlineLevel() {
    return this.style.display.outer === 'inline' && !this.isOutOfFlow();
  }

  setContainingBlock(area: BoxArea) {
    this.containingBlock = area;
    this.borderArea.setParent(area);
  }

  /**
   * Assign the offsets of the padding and content areas from the border area,
   * as defined by the style. The containing block must be set first.
   */
  fillAreas() {
    this.paddingArea.x = this.style.getBorderLeftWidth();
    this.paddingArea.y = this.style.getBorderTopWidth();
    this.contentArea.x = this.getPaddingLeft();
    this.contentArea.y = this.getPaddingTop();
  }

  setBlockPosition(y: number) {
    this.borderArea.y = y;
  }

  setInlinePosition(x: number) {
    this.borderArea.x = x;
  }

  setBlockSize(size: number) {
    size = Math.max(0, size);
    this.contentArea.height = size;
    this.paddingArea.height = size + this.getPaddingTop() + this.getPaddingBottom();
    this.borderArea.height = this.paddingArea.height
      + this.style.getBorderTopWidth()
      + this.style.getBorderBottomWidth();
  }

  setInlineOuterSize(size: number) {
    const borderLeft = this.style.getBorderLeftWidth();
    const borderRight = this.style.getBorderRightWidth();
    const paddingLeft = this.getPaddingLeft();
    const paddingRight = this.getPaddingRight();
    const contentSize = Math.max(0, size - borderLeft - borderRight - paddingLeft - paddingRight);
    this.contentArea.width = contentSize;
    this.paddingArea.width = contentSize + paddingLeft + paddingRight;
    this.borderArea.width = this.paddingArea.width + borderLeft + borderRight;
  }

  /**
   * Horizontal border and padding, which box-sizing: border-box includes in
   * the width property
   */
  getInlineEdges() {
    return this.style.getBorderLeftWidth()
      + this.getPaddingLeft()
      + this.getPaddingRight()
      + this.style.getBorderRightWidth();
  }

  getBlockEdges() {
    return this.style.getBorderTopWidth()
      + this.getPaddingTop()
      + this.getPaddingBottom()
      + this.style.getBorderBottomWidth();
  }

  /**
   * Width of the border box from a used width property value
   */
  outerSizeFromWidth(width: number) {
    if (this.style.boxSizing === 'border-box') return Math.max(width, this.getInlineEdges());
    return Math.max(0, width) + this.getInlineEdges();
  }

  /**
   * Height of the content box from a used height property value
   */
  contentSizeFromHeight(height: number) {
    if (this.style.boxSizing === 'border-box') return Math.max(0, height - this.getBlockEdges());
    return Math.max(0, height);
  }

  /**
   * CSS2.2 § 10.3.3 for a block-level box in normal flow. `outerSize` is the
   * used border-box width, or auto to fill the containing block.
   */
  doInlineBoxModel(outerSize: number | 'auto') {
    const cInlineSize = this.containingBlock.width;
    const marginLeft = this.getMarginLeft();
    const marginRight = this.getMarginRight();
    let left = marginLeft === 'auto' ? 0 : marginLeft;
    let right = marginRight === 'auto' ? 0 : marginRight;

    if (outerSize === 'auto') {
      // Paragraph 5: auto width
      outerSize = Math.max(0, cInlineSize - left - right);
    } else {
      const specifiedInlineSize = outerSize + left + right;

      if (
        // Paragraph 2: auto margins are zero if the box doesn't fit
        specifiedInlineSize > cInlineSize ||
        // Paragraph 3: over-constrained, so the right margin gives
        marginLeft !== 'auto' && marginRight !== 'auto'
      ) {
        right = cInlineSize - (specifiedInlineSize - right);
      } else if (marginLeft === 'auto' && marginRight !== 'auto') {
        // Paragraph 4: only auto value is margin-left
        left = cInlineSize - specifiedInlineSize;
      } else if (marginRight === 'auto' && marginLeft !== 'auto') {
        right = cInlineSize - specifiedInlineSize;
      } else {
        // Paragraph 6: two auto values, center the content
        left = right = (cInlineSize - specifiedInlineSize) / 2;
      }
    }

    this.margin.left = left;
    this.margin.right = right;
    this.setInlinePosition(left);
    this.setInlineOuterSize(outerSize);
  }

  getMarginBoxWidth() {
    return this.margin.left + this.borderArea.width + this.margin.right;
  }

  getMarginBoxHeight() {
    return this.margin.top + this.borderArea.height + this.margin.bottom;
  }

  postlayoutPreorder() {
    this.borderArea.x += this.relativeOffset.x;
    this.borderArea.y += this.relativeOffset.y;
    this.borderArea.absolutify();
    this.paddingArea.absolutify();
    this.contentArea.absolutify();
  }

  abstract getFirstBaseline(): number | undefined;

  /**
   * Width of the margin box when laid out in an infinitely wide space
   */
  abstract contribution(ctx: MeasureContext): number;
}

export class BoxArea {
  parent: BoxArea | null;
  box: Box | null;
  x: number;
  y: number;
  width: number;
  height: number;

  constructor(box: Box | null, x = 0, y = 0, w = 0, h = 0) {
    this.parent = null;
    this.box = box;
    this.x = x;
    this.y = y;
    this.width = w;
    this.height = h;
  }

  setParent(p: BoxArea) {
    this.parent = p;
  }

  absolutify() {
    if (!this.parent) {
      throw new Error(`Cannot absolutify area for ${this.box?.id}, parent was never set`);
    }

    this.x += this.parent.x;
    this.y += this.parent.y;
  }
}

const EmptyContainingBlock = new BoxArea(null);
