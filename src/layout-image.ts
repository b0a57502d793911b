import {FormattingBox, MarginCollapseCollection} from './layout-box.js';

import type {HTMLElement, NodeId} from './dom.js';
import type {Style} from './style.js';
import type {MeasureContext} from './layout-box.js';
import type {Logger, TreeLogOptions} from './util.js';

const replacedElements = new Set(['img', 'video', 'canvas', 'iframe']);

export function isReplacedElement(el: HTMLElement) {
  return replacedElements.has(el.tagName);
}

function parseDimension(value: string | undefined) {
  if (value === undefined) return;
  const n = Number.parseFloat(value);
  if (Number.isFinite(n) && n >= 0) return n;
}

/**
 * HTML's width and height attributes. Nothing is ever fetched, so these are
 * the only source of an intrinsic size.
 */
export function intrinsicSizeFromAttrs(el: HTMLElement) {
  const width = parseDimension(el.getAttribute('width'));
  const height = parseDimension(el.getAttribute('height'));
  const ratio = width !== undefined && height ? width / height : undefined;
  return {width: width ?? 0, height: height ?? 0, ratio};
}

/**
 * An element whose content is outside the scope of CSS (CSS2.2 § 3.1). It's
 * painted as a placeholder the renderer fills in.
 */
export class ReplacedBox extends FormattingBox {
  public src: string;
  public intrinsicWidth: number;
  public intrinsicHeight: number;
  public ratio: number | undefined;

  constructor(style: Style, node: NodeId, attrs: number, el: HTMLElement) {
    super(style, node, attrs);
    const {width, height, ratio} = intrinsicSizeFromAttrs(el);
    this.src = el.getAttribute('src') ?? '';
    this.intrinsicWidth = width;
    this.intrinsicHeight = height;
    this.ratio = ratio;
  }

  isReplacedBox(): this is ReplacedBox {
    return true;
  }

  getLogSymbol() {
    return '▣';
  }

  logName(log: Logger, _options?: TreeLogOptions) {
    log.text(`Replaced ${this.id} ${this.intrinsicWidth}⨯${this.intrinsicHeight}`);
    if (this.src) log.text(` ${this.src}`);
  }

  getFirstBaseline() {
    return undefined;
  }

  /**
   * Content-box size: CSS2.2 § 10.3.2 and § 10.6.2. When only one dimension
   * is given, the other comes from the intrinsic ratio.
   */
  getUsedSize(ctx: MeasureContext, cbHeight: number | undefined) {
    const {style} = this;
    let width: number | undefined;
    let height: number | undefined;

    if (typeof style.width === 'number') {
      width = this.outerSizeFromWidth(style.width) - this.getInlineEdges();
    } else if (style.width !== 'auto') {
      const base = this.containingBlock.width;
      width = this.outerSizeFromWidth(style.width.value / 100 * base) - this.getInlineEdges();
    }

    if (typeof style.height === 'number') {
      height = this.contentSizeFromHeight(style.height);
    } else if (style.height !== 'auto') {
      if (cbHeight === undefined) {
        ctx.diagnostics.report(
          'UnresolvedDimension',
          `height: ${style.height.value}% has no definite containing block height`,
          this.node
        );
      } else {
        height = this.contentSizeFromHeight(style.height.value / 100 * cbHeight);
      }
    }

    if (width === undefined && height === undefined) {
      return {width: this.intrinsicWidth, height: this.intrinsicHeight};
    }

    if (width === undefined) {
      width = height !== undefined && this.ratio !== undefined
        ? height * this.ratio
        : this.intrinsicWidth;
    }

    if (height === undefined) {
      height = this.ratio ? width / this.ratio : this.intrinsicHeight;
    }

    return {width, height};
  }

  contribution(ctx: MeasureContext) {
    const {left, right} = this.getMarginsAutoIsZero();
    const {width} = this.getUsedSize(ctx, undefined);
    return left + width + this.getInlineEdges() + right;
  }
}

/**
 * Sizes the box. Block-level replaced boxes also get CSS2.2 § 10.3.4 margins
 * and take part in margin collapsing; inline ones are positioned on a line.
 */
export function layoutReplacedBox(
  box: ReplacedBox,
  ctx: MeasureContext,
  cbHeight: number | undefined,
  blockLevel: boolean
) {
  const margins = box.getMarginsAutoIsZero();
  const {width, height} = box.getUsedSize(ctx, cbHeight);

  box.fillAreas();

  if (blockLevel) {
    box.doInlineBoxModel(width + box.getInlineEdges());
  } else {
    box.margin.left = margins.left;
    box.margin.right = margins.right;
    box.setInlineOuterSize(width + box.getInlineEdges());
  }

  box.margin.top = margins.top;
  box.margin.bottom = margins.bottom;
  box.setBlockSize(height);
  box.collapsedTop = new MarginCollapseCollection(margins.top);
  box.collapsedBottom = new MarginCollapseCollection(margins.bottom);
  box.collapsesThrough = false;
}
