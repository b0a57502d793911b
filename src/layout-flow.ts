import {NO_NODE} from './dom.js';
import {createAnonymousStyle, initialStyle} from './style.js';
import {Diagnostics} from './diagnostics.js';
import {defaultEnvironment} from './environment.js';
import {Measurer} from './text-measure.js';
import {Run, Paragraph, collapseWhitespace, getMetrics} from './layout-text.js';
import {ReplacedBox, isReplacedElement, layoutReplacedBox} from './layout-image.js';
import {Logger} from './util.js';
import {
  Box,
  BoxArea,
  FormattingBox,
  MarginCollapseCollection,
  RenderItem,
  resolvePercent
} from './layout-box.js';

import type {Document, DocNode, HTMLElement, NodeId} from './dom.js';
import type {Style, ComputeContext} from './style.js';
import type {StyleTree} from './cascade.js';
import type {Environment} from './environment.js';
import type {MeasurementProvider} from './text-measure.js';
import type {MeasureContext} from './layout-box.js';
import type {TextLayoutContext} from './layout-text.js';
import type {LoggerOptions, TreeLogOptions} from './util.js';
import type {Diagnostic} from './diagnostics.js';

/**
 * Elements with this attribute log their box tree and line breaks
 */
export const LOG_ATTRIBUTE = 'x-stylebox-log';

export interface LayoutContext extends MeasureContext {
  environment: Readonly<Environment>;
  /** the initial containing block, which is also the viewport */
  icb: BoxArea;
}

export interface Viewport {
  width: number;
  height: number;
  /** device pixels per CSS pixel, only read by renderers */
  scale?: number;
}

/**
 * Marker box of a list item (CSS Lists 3 § 3). Coordinates are relative to the
 * item's content area during layout and absolute after.
 */
export interface ListMarker {
  text: string;
  style: Style;
  x: number;
  /** y of the baseline */
  y: number;
  width: number;
  ascent: number;
  descent: number;
}

export interface BlockContainerOfInlines extends BlockContainer {
  children: IfcInline[];
}

export interface BlockContainerOfBlocks extends BlockContainer {
  children: FormattingBox[];
}

export class BlockContainer extends FormattingBox {
  public children: FormattingBox[] | IfcInline[];
  public marker: ListMarker | undefined;

  static ATTRS = {
    ...Box.ATTRS,
    isInline: Box.BITS.isInline,
    isBfcRoot: Box.BITS.isBfcRoot
  };

  constructor(style: Style, node: NodeId, children: FormattingBox[] | IfcInline[], attrs: number) {
    super(style, node, attrs);
    this.children = children;
    this.marker = undefined;
  }

  getLogSymbol() {
    if (this.isOutOfFlow()) {
      return '○︎';
    } else if (this.isInlineBlock()) {
      return '▬';
    } else {
      return '◼︎';
    }
  }

  logName(log: Logger, _options?: TreeLogOptions) {
    if (this.isAnonymous()) log.dim();
    if (this.isBfcRoot()) log.underline();
    log.text(`Block ${this.id}`);
    log.reset();
    if (this.marker) log.text(` marker "${this.marker.text}"`);
  }

  isBlockContainer(): this is BlockContainer {
    return true;
  }

  isBfcRoot() {
    return Boolean(this.bitfield & Box.BITS.isBfcRoot) || this.isOutOfFlow();
  }

  isInlineBlock() {
    return Boolean(this.bitfield & Box.BITS.isInline) && !this.isOutOfFlow();
  }

  isBlockContainerOfInlines(): this is BlockContainerOfInlines {
    return Boolean(this.children.length && this.children[0].isIfcInline());
  }

  isBlockContainerOfBlocks(): this is BlockContainerOfBlocks {
    return !this.isBlockContainerOfInlines();
  }

  /**
   * Relative to the top of the content area. Only valid during layout, before
   * areas are made absolute.
   */
  getFirstBaseline(): number | undefined {
    for (const child of this.children) {
      if (child.isIfcInline()) return child.paragraph.getFirstBaseline();
      if (child.isOutOfFlow()) continue;
      const baseline = child.getFirstBaseline();
      if (baseline !== undefined) {
        return child.borderArea.y + child.paddingArea.y + child.contentArea.y + baseline;
      }
    }
  }

  contribution(ctx: MeasureContext): number {
    const {left, right} = this.getMarginsAutoIsZero();
    const width = this.style.width;

    if (typeof width === 'number') return left + this.outerSizeFromWidth(width) + right;

    if (width !== 'auto') {
      // The containing block's width depends on this box's
      ctx.diagnostics.report(
        'UnresolvedDimension',
        `width: ${width.value}% has no definite containing block width`,
        this.node
      );
      return left + this.outerSizeFromWidth(0) + right;
    }

    let inner = 0;

    for (const child of this.children) {
      if (child.isIfcInline()) {
        inner = Math.max(inner, child.paragraph.maxContent(intrinsicTextContext(ctx)));
      } else if (!child.isOutOfFlow()) {
        inner = Math.max(inner, child.contribution(ctx));
      }
    }

    return left + inner + this.getInlineEdges() + right;
  }

  postlayoutPreorder() {
    super.postlayoutPreorder();
    if (this.marker) {
      this.marker.x += this.contentArea.x;
      this.marker.y += this.contentArea.y;
    }
  }
}

export class Break extends RenderItem {
  isBreak(): this is Break {
    return true;
  }

  getLogSymbol() {
    return '⏎';
  }

  logName(log: Logger) {
    log.text('BR');
  }
}

export class Inline extends Box {
  public children: InlineLevel[];
  public start: number;
  public end: number;

  constructor(
    start: number,
    end: number,
    style: Style,
    node: NodeId,
    children: InlineLevel[],
    attrs: number
  ) {
    super(style, node, attrs);
    this.start = start;
    this.end = end;
    this.children = children;
  }

  isInline(): this is Inline {
    return true;
  }

  getLogSymbol() {
    return '▭';
  }

  logName(log: Logger) {
    if (this.isAnonymous()) log.dim();
    if (this.isIfcInline()) log.underline();
    log.text(`Inline ${this.id}`);
    log.reset();
  }
}

/**
 * The root inline of an inline formatting context. It owns the text of the
 * whole paragraph; runs and inlines index into it.
 */
export class IfcInline extends Inline {
  public text: string;
  public paragraph: Paragraph;

  constructor(style: Style, text: string, children: InlineLevel[], attrs: number) {
    super(0, text.length, style, NO_NODE, children, Box.ATTRS.isAnonymous | attrs);
    this.text = text;
    this.paragraph = new Paragraph(this);
    collapseWhitespace(this);
  }

  isIfcInline(): this is IfcInline {
    return true;
  }

  /**
   * Moves everything the paragraph positioned into absolute coordinates. The
   * containing block (the content area of the block container) must already
   * be absolute.
   */
  postlayoutPreorder() {
    const {x, y} = this.containingBlock;

    for (const linebox of this.paragraph.lineboxes) {
      linebox.x += x;
      linebox.y += y;
      for (const fragment of linebox.fragments) {
        fragment.x += x;
        fragment.y += y;
      }
    }

    for (const backgrounds of this.paragraph.backgroundBoxes.values()) {
      for (const background of backgrounds) {
        background.x += x;
        background.y += y;
      }
    }
  }
}

export type InlineLevel = Inline | FormattingBox | Run | Break;

//
// Box generation (CSS2.2 § 9.2)
//

interface BoxGenerationContext {
  doc: Document;
  styles: StyleTree;
  compute: ComputeContext;
}

interface ParagraphText {
  value: string;
}

function styleOf(ctx: BoxGenerationContext, node: DocNode): Style {
  const style = ctx.styles[node.id];
  if (!style) throw new Error(`No computed style for node ${node.id}`);
  return style;
}

function loggingAttrs(el: HTMLElement) {
  return el.getAttribute(LOG_ATTRIBUTE) !== undefined ? Box.ATTRS.enableLogging : 0;
}

function isBlockLevel(style: Style) {
  return style.display.outer === 'block';
}

const markerGlyphs = {disc: '•', circle: '◦', square: '▪'};

/**
 * The list item's number: its position among list-item siblings, counting
 * from the `start` attribute of an ol parent
 */
function listItemOrdinal(ctx: BoxGenerationContext, el: HTMLElement) {
  const parent = ctx.doc.parentOf(el);
  if (!parent) return 1;

  let ordinal = 1;

  if (parent.tagName === 'ol') {
    const start = Number.parseInt(parent.getAttribute('start') ?? '', 10);
    if (Number.isFinite(start)) ordinal = start;
  }

  for (const sibling of ctx.doc.childrenOf(parent)) {
    if (sibling === el) break;
    if (sibling.isElement()) {
      const display = styleOf(ctx, sibling).display;
      if (display.listItem && display.outer !== 'none') ordinal++;
    }
  }

  return ordinal;
}

function createMarker(ctx: BoxGenerationContext, el: HTMLElement, style: Style) {
  const type = style.listStyleType;
  if (!style.display.listItem || type === 'none') return;
  const text = type === 'decimal' ? `${listItemOrdinal(ctx, el)}.` : markerGlyphs[type];
  const marker: ListMarker = {text, style, x: 0, y: 0, width: 0, ascent: 0, descent: 0};
  return marker;
}

function generateFormattingBox(ctx: BoxGenerationContext, el: HTMLElement): FormattingBox {
  if (isReplacedElement(el)) {
    return new ReplacedBox(styleOf(ctx, el), el.id, loggingAttrs(el), el);
  }
  return generateBlockContainer(ctx, el);
}

// Helper for generateInlineBox
function mapTree(
  ctx: BoxGenerationContext,
  el: HTMLElement,
  text: ParagraphText,
  path: number[],
  level: number
): [boolean, Inline] {
  const start = text.value.length;
  const children: InlineLevel[] = [];
  let bail = false;

  if (!path[level]) path[level] = 0;

  while (!bail && path[level] < el.children.length) {
    const childNode = ctx.doc.node(el.children[path[level]]);
    let child: InlineLevel | undefined;

    if (childNode.isElement()) {
      const style = styleOf(ctx, childNode);

      if (style.display.outer === 'none') {
        path[level]++;
        continue;
      }

      if (childNode.tagName === 'br') {
        child = new Break(style);
      } else if (isBlockLevel(style)) {
        bail = true;
      } else if (
        isReplacedElement(childNode) ||
        style.display.inner === 'flow-root' ||
        style.isOutOfFlow()
      ) {
        child = generateFormattingBox(ctx, childNode);
      } else {
        [bail, child] = mapTree(ctx, childNode, text, path, level + 1);
      }
    } else {
      const start = text.value.length;
      const end = start + childNode.text.length;
      child = new Run(start, end, styleOf(ctx, childNode));
      text.value += childNode.text;
    }

    if (child) children.push(child);
    if (!bail) path[level]++;
  }

  if (!bail) path.pop();
  const end = text.value.length;
  const box = new Inline(start, end, styleOf(ctx, el), el.id, children, loggingAttrs(el));

  return [bail, box];
}

// Generates at least one inline box for the element. This must be called
// repeatedly until the first tuple value returns false to split out all block-
// level elements and the (fully nested) inlines in between and around them.
function generateInlineBox(
  ctx: BoxGenerationContext,
  el: HTMLElement,
  text: ParagraphText,
  path: number[]
): [boolean, Inline | FormattingBox] {
  const target = ctx.doc.getEl(el, path);

  if (target && target !== el && target.isElement() && isBlockLevel(styleOf(ctx, target))) {
    ++path[path.length - 1];
    return [true, generateFormattingBox(ctx, target)];
  }

  return mapTree(ctx, el, text, path, 0);
}

// Wraps consecutive inlines and runs in block-level block containers.
// CSS2.1 section 9.2.1.1
function wrapInBlockContainer(
  ctx: BoxGenerationContext,
  parentEl: HTMLElement,
  inlines: InlineLevel[],
  text: ParagraphText
) {
  const anonStyle = createAnonymousStyle(styleOf(ctx, parentEl), ctx.compute);
  const attrs = Box.ATTRS.isAnonymous | loggingAttrs(parentEl);
  const ifc = new IfcInline(anonStyle, text.value, inlines, attrs);
  return new BlockContainer(anonStyle, NO_NODE, [ifc], attrs);
}

// Generates a block container for the element
function generateBlockContainer(ctx: BoxGenerationContext, el: HTMLElement): BlockContainer {
  const style = styleOf(ctx, el);
  const text: ParagraphText = {value: ''};
  const blocks: FormattingBox[] = [];
  let inlines: InlineLevel[] = [];
  let attrs = loggingAttrs(el);

  const flushInlines = () => {
    if (inlines.length) {
      blocks.push(wrapInBlockContainer(ctx, el, inlines, text));
      inlines = [];
      text.value = '';
    }
  };

  if (style.display.inner === 'flow-root' || style.isOutOfFlow() || el.parent === NO_NODE) {
    attrs |= BlockContainer.ATTRS.isBfcRoot;
  }

  if (style.display.outer === 'inline' && !style.isOutOfFlow()) {
    attrs |= BlockContainer.ATTRS.isInline;
  }

  for (const child of ctx.doc.childrenOf(el)) {
    if (child.isElement()) {
      const childStyle = styleOf(ctx, child);

      if (childStyle.display.outer === 'none') continue;

      if (child.tagName === 'br') {
        inlines.push(new Break(childStyle));
      } else if (isBlockLevel(childStyle)) {
        flushInlines();
        blocks.push(generateFormattingBox(ctx, child));
      } else if (
        isReplacedElement(child) ||
        childStyle.display.inner === 'flow-root' ||
        childStyle.isOutOfFlow()
      ) {
        inlines.push(generateFormattingBox(ctx, child));
      } else {
        const path: number[] = [];
        let more: boolean;
        let box: Inline | FormattingBox;

        do {
          [more, box] = generateInlineBox(ctx, child, text, path);

          if (box.isInline()) {
            inlines.push(box);
          } else {
            flushInlines();
            blocks.push(box);
          }
        } while (more);
      }
    } else {
      const start = text.value.length;
      const end = start + child.text.length;
      inlines.push(new Run(start, end, styleOf(ctx, child)));
      text.value += child.text;
    }
  }

  let children: FormattingBox[] | IfcInline[];

  if (inlines.length) {
    if (blocks.length) {
      flushInlines();
      children = blocks;
    } else {
      const anonStyle = createAnonymousStyle(style, ctx.compute);
      const ifcAttrs = Box.ATTRS.isAnonymous | loggingAttrs(el);
      children = [new IfcInline(anonStyle, text.value, inlines, ifcAttrs)];
    }
  } else {
    children = blocks;
  }

  const box = new BlockContainer(style, el.id, children, attrs);
  box.marker = createMarker(ctx, el, style);
  return box;
}

function generateRoot(ctx: BoxGenerationContext): BlockContainer {
  const root = ctx.doc.root;

  if (styleOf(ctx, root).display.outer === 'none') {
    const style = createAnonymousStyle(initialStyle, ctx.compute);
    return new BlockContainer(style, root.id, [], BlockContainer.ATTRS.isBfcRoot);
  }

  return generateBlockContainer(ctx, root);
}

/**
 * Numbers every box in tree order. Ids only need to be unique within one
 * layout, so running layout twice gives the same ids.
 */
export function assignBoxIds(root: BlockContainer) {
  let id = 0;
  for (const box of boxes(root)) box.id = String(id++);
}

/**
 * CSS2.2 § 10.1. Fixed boxes use the viewport, absolute boxes the padding area
 * of the nearest positioned block container, everything else the content area
 * of the nearest block container.
 */
function assignContainingBlocks(root: BlockContainer, icb: BoxArea) {
  const visitInline = (inline: Inline, blockArea: BoxArea, positionedArea: BoxArea) => {
    inline.containingBlock = blockArea;
    for (const child of inline.children) {
      if (child.isInline()) {
        visitInline(child, blockArea, positionedArea);
      } else if (child.isFormattingBox()) {
        visit(child, blockArea, positionedArea);
      }
    }
  };

  const visit = (box: FormattingBox, blockArea: BoxArea, positionedArea: BoxArea) => {
    if (box.style.position === 'fixed') {
      box.setContainingBlock(icb);
    } else if (box.style.position === 'absolute') {
      box.setContainingBlock(positionedArea);
    } else {
      box.setContainingBlock(blockArea);
    }

    if (box.isBlockContainer()) {
      const childPositionedArea = box.isPositioned() ? box.paddingArea : positionedArea;
      for (const child of box.children) {
        if (child.isIfcInline()) {
          visitInline(child, box.contentArea, childPositionedArea);
        } else {
          visit(child, box.contentArea, childPositionedArea);
        }
      }
    }
  };

  visit(root, icb, icb);
}

//
// Layout
//

function intrinsicTextContext(ctx: MeasureContext): TextLayoutContext {
  return {
    measurer: ctx.measurer,
    diagnostics: ctx.diagnostics,
    log: ctx.log,
    mode: 'max-content',
    layoutAtomic() {
      throw new Error('Assertion failed');
    }
  };
}

function textContext(ctx: LayoutContext, cbHeight: number | undefined): TextLayoutContext {
  return {
    measurer: ctx.measurer,
    diagnostics: ctx.diagnostics,
    log: ctx.log,
    mode: 'normal',
    layoutAtomic(box) {
      layoutAtomic(box, ctx, cbHeight);
    }
  };
}

function setRelativeOffset(box: Box, ctx: MeasureContext, cbHeight: number | undefined) {
  if (box.style.position !== 'relative') {
    box.relativeOffset = {x: 0, y: 0};
    return;
  }

  box.relativeOffset = {
    x: box.getRelativeHorizontalShift(),
    y: box.getRelativeVerticalShift(cbHeight, () => {
      ctx.diagnostics.report(
        'UnresolvedDimension',
        'top or bottom percentage has no definite containing block height',
        box.node
      );
    })
  };
}

function setInlineRelativeOffsets(inline: Inline, ctx: MeasureContext, cbHeight: number | undefined) {
  for (const child of inline.children) {
    if (child.isInline()) {
      setRelativeOffset(child, ctx, cbHeight);
      setInlineRelativeOffsets(child, ctx, cbHeight);
    }
  }
}

/**
 * Used content-box height, or undefined if it depends on the content
 * (CSS2.2 § 10.5, § 10.6.3)
 */
function resolveHeight(box: FormattingBox, ctx: MeasureContext, cbHeight: number | undefined) {
  const height = box.style.height;

  if (height === 'auto') return;
  if (typeof height === 'number') return box.contentSizeFromHeight(height);

  if (cbHeight === undefined) {
    ctx.diagnostics.report(
      'UnresolvedDimension',
      `height: ${height.value}% has no definite containing block height`,
      box.node
    );
    return;
  }

  return box.contentSizeFromHeight(height.value / 100 * cbHeight);
}

function resolveOuterWidth(box: FormattingBox): number | 'auto' {
  const width = box.style.width;
  if (width === 'auto') return 'auto';
  return box.outerSizeFromWidth(resolvePercent(width, box.containingBlock.width));
}

function layoutMarker(box: BlockContainer, ctx: LayoutContext) {
  const marker = box.marker;
  if (!marker) return;

  const metrics = getMetrics(marker.style, ctx.measurer);
  const gap = ctx.environment.listMarkerGap * marker.style.fontSize;

  marker.width = ctx.measurer.wordAdvance(marker.style.getFont(), marker.text);
  marker.ascent = metrics.ascent;
  marker.descent = metrics.descent;
  marker.x = -(marker.width + gap);
  marker.y = box.getFirstBaseline()
    ?? metrics.ascent + (metrics.lineHeight - (metrics.ascent + metrics.descent)) / 2;
}

/**
 * Lays out the children of a block container whose width is already known,
 * collapsing margins (CSS2.2 § 8.3.1) and setting the container's height.
 * `height` is the used content height if it doesn't depend on the content.
 */
function layoutContents(box: BlockContainer, ctx: LayoutContext, height: number | undefined) {
  const bfcRoot = box.isBfcRoot();
  const topAdjoins = !bfcRoot && box.style.getBorderTopWidth() === 0 && box.getPaddingTop() === 0;
  const bottomSeparated = box.style.getBorderBottomWidth() > 0 || box.getPaddingBottom() > 0;
  const collapsedTop = new MarginCollapseCollection(box.margin.top);
  let pending = new MarginCollapseCollection();
  let cursor = 0;
  let placed = false;

  for (const child of box.children) {
    if (child.isIfcInline()) {
      setInlineRelativeOffsets(child, ctx, height);
      child.paragraph.layout(box.contentArea.width, box.contentArea, textContext(ctx, height));
      if (child.paragraph.lineboxes.length) {
        placed = true;
        cursor = child.paragraph.height;
      }
      continue;
    }

    if (child.isOutOfFlow()) {
      const y = placed || !topAdjoins ? cursor + pending.get() : 0;
      child.staticPosition = {area: box.contentArea, x: 0, y};
      continue;
    }

    if (child.isBlockContainer()) {
      layoutBlockBox(child, ctx, height);
    } else if (child.isReplacedBox()) {
      layoutReplacedBox(child, ctx, height, true);
      setRelativeOffset(child, ctx, height);
    }

    const atStart = !placed && topAdjoins;

    if (atStart) {
      // The child's top margin becomes part of ours
      collapsedTop.addCollection(child.collapsedTop);
      child.setBlockPosition(0);
    } else if (child.collapsesThrough) {
      child.setBlockPosition(cursor + pending.clone().addCollection(child.collapsedTop).get());
    } else {
      child.setBlockPosition(cursor + pending.addCollection(child.collapsedTop).get());
    }

    if (child.collapsesThrough) {
      if (!atStart) pending.addCollection(child.collapsedTop);
    } else {
      cursor = child.borderArea.y + child.borderArea.height;
      pending = child.collapsedBottom.clone();
      placed = true;
    }
  }

  const collapsesThrough = !bfcRoot
    && !placed
    && topAdjoins
    && !bottomSeparated
    && (height === undefined || height === 0);

  let contentHeight: number;

  if (collapsesThrough) {
    const margins = collapsedTop.addCollection(pending).add(box.margin.bottom);
    box.collapsedTop = margins;
    box.collapsedBottom = margins;
    contentHeight = 0;
  } else if (!bfcRoot && !bottomSeparated && height === undefined) {
    // The last child's bottom margin becomes part of ours
    box.collapsedTop = collapsedTop;
    box.collapsedBottom = pending.add(box.margin.bottom);
    contentHeight = cursor;
  } else {
    box.collapsedTop = collapsedTop;
    box.collapsedBottom = new MarginCollapseCollection(box.margin.bottom);
    contentHeight = cursor + pending.get();
  }

  box.collapsesThrough = collapsesThrough;
  box.setBlockSize(height ?? contentHeight);

  layoutMarker(box, ctx);

  if (box.loggingEnabled() && !box.isAnonymous()) {
    const log = new Logger(ctx.log);
    box.log({containingBlocks: true}, log);
    log.flush();
  }
}

/**
 * A block-level block container in normal flow (CSS2.2 § 10.3.3, § 10.6.3)
 */
export function layoutBlockBox(box: BlockContainer, ctx: LayoutContext, cbHeight: number | undefined) {
  const margins = box.getMarginsAutoIsZero();

  box.fillAreas();
  box.margin.top = margins.top;
  box.margin.bottom = margins.bottom;
  box.doInlineBoxModel(resolveOuterWidth(box));
  setRelativeOffset(box, ctx, cbHeight);
  layoutContents(box, ctx, resolveHeight(box, ctx, cbHeight));
}

/**
 * Inline-blocks and inline replaced elements (CSS2.2 § 10.3.9, § 10.3.2)
 */
function layoutAtomic(box: FormattingBox, ctx: LayoutContext, cbHeight: number | undefined) {
  if (box.isReplacedBox()) {
    layoutReplacedBox(box, ctx, cbHeight, false);
  } else if (box.isBlockContainer()) {
    const margins = box.getMarginsAutoIsZero();
    const width = resolveOuterWidth(box);
    let outerSize: number;

    box.fillAreas();
    box.margin = margins;

    if (width === 'auto') {
      // Shrink-to-fit
      const available = box.containingBlock.width - margins.left - margins.right;
      const preferred = box.contribution(ctx) - margins.left - margins.right;
      outerSize = Math.max(0, Math.min(preferred, available));
    } else {
      outerSize = width;
    }

    box.setInlineOuterSize(outerSize);
    layoutContents(box, ctx, resolveHeight(box, ctx, cbHeight));
  }

  setRelativeOffset(box, ctx, cbHeight);
}

/**
 * CSS2.2 § 10.3.7 and § 10.6.4, with auto margins treated as zero. Runs after
 * normal flow is absolute, so the static position and containing block are
 * in the same coordinate space.
 */
function layoutAbsolute(box: FormattingBox, ctx: LayoutContext) {
  const cb = box.containingBlock;
  const {style} = box;
  const margins = box.getMarginsAutoIsZero();
  const left = style.left === 'auto' ? undefined : resolvePercent(style.left, cb.width);
  const right = style.right === 'auto' ? undefined : resolvePercent(style.right, cb.width);
  const top = style.top === 'auto' ? undefined : resolvePercent(style.top, cb.height);
  const bottom = style.bottom === 'auto' ? undefined : resolvePercent(style.bottom, cb.height);
  const sp = box.staticPosition;
  const staticX = sp ? sp.area.x + sp.x - cb.x : 0;
  const staticY = sp ? sp.area.y + sp.y - cb.y : 0;

  box.fillAreas();

  if (box.isReplacedBox()) {
    layoutReplacedBox(box, ctx, cb.height, false);
  } else if (box.isBlockContainer()) {
    const width = resolveOuterWidth(box);
    let outerSize: number;

    box.margin = margins;

    if (width === 'auto') {
      const available = cb.width - (left ?? 0) - (right ?? 0) - margins.left - margins.right;
      if (left !== undefined && right !== undefined) {
        outerSize = available;
      } else {
        outerSize = Math.min(box.contribution(ctx) - margins.left - margins.right, available);
      }
    } else {
      outerSize = width;
    }

    box.setInlineOuterSize(Math.max(0, outerSize));

    let height = resolveHeight(box, ctx, cb.height);

    if (height === undefined && style.height === 'auto' && top !== undefined && bottom !== undefined) {
      height = Math.max(0, cb.height - top - bottom - margins.top - margins.bottom - box.getBlockEdges());
    }

    layoutContents(box, ctx, height);
  }

  const {width, height} = box.borderArea;
  let x = staticX + margins.left;
  let y = staticY + margins.top;

  if (left !== undefined) {
    x = left + margins.left;
  } else if (right !== undefined) {
    x = cb.width - right - margins.right - width;
  }

  if (top !== undefined) {
    y = top + margins.top;
  } else if (bottom !== undefined) {
    y = cb.height - bottom - margins.bottom - height;
  }

  box.setInlinePosition(x);
  box.setBlockPosition(y);
}

function atomicsOf(inline: Inline, into: FormattingBox[]) {
  for (const child of inline.children) {
    if (child.isInline()) {
      atomicsOf(child, into);
    } else if (child.isFormattingBox()) {
      into.push(child);
    }
  }
  return into;
}

/**
 * Converts the areas under `from` to absolute coordinates in preorder and
 * returns the out-of-flow boxes found, which are laid out afterwards
 */
function absolutify(from: FormattingBox) {
  const outOfFlow: FormattingBox[] = [];
  const stack: FormattingBox[] = [from];

  while (stack.length) {
    const box = stack.pop();
    if (!box) break;

    if (box !== from && box.isOutOfFlow()) {
      outOfFlow.push(box);
      continue;
    }

    box.postlayoutPreorder();

    if (box.isBlockContainer()) {
      const children: FormattingBox[] = [];

      for (const child of box.children) {
        if (child.isIfcInline()) {
          child.postlayoutPreorder();
          atomicsOf(child, children);
        } else {
          children.push(child);
        }
      }

      for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
    }
  }

  return outOfFlow;
}

export interface LayoutOptions {
  diagnostics?: Diagnostics;
  environment?: Readonly<Environment>;
  /** output of the x-stylebox-log attribute */
  log?: LoggerOptions;
}

export interface LayoutResult {
  root: BlockContainer;
  diagnostics: readonly Diagnostic[];
}

/**
 * Generates boxes for the document and lays them out in the viewport. Every
 * call builds a new box tree; nothing is reused from an earlier call.
 */
export function layout(
  doc: Document,
  styles: StyleTree,
  viewport: Viewport,
  provider: MeasurementProvider,
  options: LayoutOptions = {}
): LayoutResult {
  const diagnostics = options.diagnostics ?? new Diagnostics();
  const environment = options.environment ?? defaultEnvironment;
  const measurer = new Measurer(provider, diagnostics, environment);
  const icb = new BoxArea(null, 0, 0, viewport.width, viewport.height);
  const compute: ComputeContext = {
    viewportWidth: viewport.width,
    viewportHeight: viewport.height,
    rootFontSize: styles[doc.root.id]?.fontSize ?? environment.defaultFontSize
  };
  const ctx: LayoutContext = {measurer, diagnostics, environment, icb, log: options.log};
  const root = generateRoot({doc, styles, compute});

  assignBoxIds(root);
  assignContainingBlocks(root, icb);

  layoutBlockBox(root, ctx, icb.height);
  root.setBlockPosition(root.margin.top);

  const queue = absolutify(root);

  while (queue.length) {
    const box = queue.shift();
    if (!box) break;
    layoutAbsolute(box, ctx);
    queue.unshift(...absolutify(box));
  }

  return {root, diagnostics: diagnostics.toArray()};
}

/**
 * Every FormattingBox, Inline and IfcInline under `root` in tree order
 */
export function* boxes(root: BlockContainer): Generator<Box> {
  const stack: RenderItem[] = [root];

  while (stack.length) {
    const item = stack.pop();
    if (!item) break;
    if (item.isBox()) yield item;
    if (item.isBlockContainer() || item.isInline()) {
      for (let i = item.children.length - 1; i >= 0; i--) stack.push(item.children[i]);
    }
  }
}
