import type {Box, FormattingBox, RenderItem} from './layout-box.js';
import type {BlockContainer, IfcInline, Inline, Viewport} from './layout-flow.js';
import type {BackgroundBox, TextFragment} from './layout-text.js';
import type {DisplayList, PaintOp, Side} from './display-list.js';
import type {BorderStyle, Color, Style} from './style.js';

interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

function fillRect(rect: Rect, color: Color, ops: PaintOp[]) {
  if (color.a === 0 || rect.width <= 0 || rect.height <= 0) return;
  const {x, y, width, height} = rect;
  ops.push({op: 'fillRect', x, y, width, height, color});
}

function strokeBorder(
  side: Side,
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  width: number,
  style: BorderStyle,
  color: Color,
  ops: PaintOp[]
) {
  if (width <= 0 || color.a === 0) return;
  ops.push({op: 'strokeBorder', side, x1, y1, x2, y2, width, style, color});
}

/**
 * Strokes each side down the middle of its border band. Inline fragments
 * that were split across lines only get the left and right sides where the
 * inline actually starts or ends.
 */
function paintBorders(
  style: Style,
  area: Rect,
  ops: PaintOp[],
  sides = {left: true, right: true}
) {
  const {x, y, width, height} = area;
  const top = style.getBorderTopWidth();
  const right = style.getBorderRightWidth();
  const bottom = style.getBorderBottomWidth();
  const left = style.getBorderLeftWidth();

  if (top > 0) {
    const ty = y + top / 2;
    strokeBorder('top', x, ty, x + width, ty, top, style.borderTopStyle, style.borderTopColor, ops);
  }

  if (right > 0 && sides.right) {
    const rx = x + width - right / 2;
    strokeBorder('right', rx, y, rx, y + height, right, style.borderRightStyle, style.borderRightColor, ops);
  }

  if (bottom > 0) {
    const by = y + height - bottom / 2;
    strokeBorder('bottom', x, by, x + width, by, bottom, style.borderBottomStyle, style.borderBottomColor, ops);
  }

  if (left > 0 && sides.left) {
    const lx = x + left / 2;
    strokeBorder('left', lx, y, lx, y + height, left, style.borderLeftStyle, style.borderLeftColor, ops);
  }
}

function inset(rect: Rect, top: number, right: number, bottom: number, left: number): Rect {
  return {
    x: rect.x + left,
    y: rect.y + top,
    width: rect.width - left - right,
    height: rect.height - top - bottom
  };
}

function paintFormattingBoxBackground(box: FormattingBox, ops: PaintOp[]) {
  const clip = box.style.backgroundClip;
  const area = clip === 'content-box'
    ? box.contentArea
    : clip === 'padding-box'
      ? box.paddingArea
      : box.borderArea;

  fillRect(area, box.style.backgroundColor, ops);
}

function paintInlineBackground(background: BackgroundBox, ops: PaintOp[]) {
  const {inline, naturalStart, naturalEnd} = background;
  const style = inline.style;
  const borderArea: Rect = background;

  if (style.backgroundColor.a > 0) {
    let area = borderArea;

    if (style.backgroundClip !== 'border-box') {
      area = inset(
        area,
        style.getBorderTopWidth(),
        naturalEnd ? style.getBorderRightWidth() : 0,
        style.getBorderBottomWidth(),
        naturalStart ? style.getBorderLeftWidth() : 0
      );
    }

    if (style.backgroundClip === 'content-box') {
      area = inset(
        area,
        inline.getPaddingTop(),
        naturalEnd ? inline.getPaddingRight() : 0,
        inline.getPaddingBottom(),
        naturalStart ? inline.getPaddingLeft() : 0
      );
    }

    fillRect(area, style.backgroundColor, ops);
  }

  paintBorders(style, borderArea, ops, {left: naturalStart, right: naturalEnd});
}

function paintTextDecoration(fragment: TextFragment, ops: PaintOp[]) {
  const {style} = fragment;
  const {underline, lineThrough} = style.textDecorationLine;
  const thickness = Math.max(1, style.fontSize / 16);

  if (underline) {
    fillRect(
      {x: fragment.x, y: fragment.y + thickness, width: fragment.width, height: thickness},
      style.color,
      ops
    );
  }

  if (lineThrough) {
    fillRect(
      {
        x: fragment.x,
        y: fragment.y - fragment.ascent / 3 - thickness / 2,
        width: fragment.width,
        height: thickness
      },
      style.color,
      ops
    );
  }
}

/**
 * The innermost inline in the chain that paints in a layer of its own
 */
function liftedIn(inlines: readonly Inline[]): Inline | undefined {
  for (let i = inlines.length - 1; i >= 0; i--) {
    if (inlines[i].isStackingContextRoot()) return inlines[i];
  }
  return undefined;
}

interface InlineTreeEntry<T> {
  item: T;
  /** inlines from the IFC down to the item, including the item if it's one */
  inlines: Inline[];
}

function walkInlines(ifc: IfcInline) {
  const inlines: InlineTreeEntry<Inline>[] = [];
  const boxes: InlineTreeEntry<FormattingBox>[] = [];

  const visit = (parent: Inline, path: Inline[]) => {
    for (const child of parent.children) {
      if (child.isInline()) {
        const childPath = [...path, child];
        inlines.push({item: child, inlines: childPath});
        visit(child, childPath);
      } else if (child.isFormattingBox()) {
        boxes.push({item: child, inlines: path});
      }
    }
  };

  visit(ifc, []);

  return {inlines, boxes};
}

/**
 * Paints the parts of the paragraph that belong to `owner`'s layer, or to
 * the block's layer when `owner` is undefined: inline backgrounds, then text,
 * then decorations, then atomic inlines.
 */
function paintInlines(ifc: IfcInline, owner: Inline | undefined, ops: PaintOp[]) {
  const {paragraph} = ifc;
  const {inlines, boxes} = walkInlines(ifc);

  for (const {item, inlines: path} of inlines) {
    if (liftedIn(path) !== owner || item.style.visibility === 'hidden') continue;
    for (const background of paragraph.backgroundBoxes.get(item) ?? []) {
      paintInlineBackground(background, ops);
    }
  }

  const fragments: TextFragment[] = [];

  for (const linebox of paragraph.lineboxes) {
    for (const fragment of linebox.fragments) {
      if (
        fragment.kind === 'word' &&
        fragment.style.visibility === 'visible' &&
        liftedIn(fragment.inlines) === owner
      ) {
        fragments.push(fragment);
      }
    }
  }

  for (const fragment of fragments) {
    ops.push({
      op: 'drawText',
      x: fragment.x,
      y: fragment.y,
      text: fragment.text,
      font: fragment.style.getFont(),
      color: fragment.style.color
    });
  }

  for (const fragment of fragments) paintTextDecoration(fragment, ops);

  for (const {item, inlines: path} of boxes) {
    if (liftedIn(path) === owner && !item.isStackingContextRoot()) {
      paintFormattingBox(item, ops);
    }
  }
}

function paintMarker(box: BlockContainer, ops: PaintOp[]) {
  const {marker} = box;
  if (!marker || marker.style.visibility === 'hidden') return;
  ops.push({
    op: 'drawText',
    x: marker.x,
    y: marker.y,
    text: marker.text,
    font: marker.style.getFont(),
    color: marker.style.color
  });
}

function paintFormattingBoxOwn(box: FormattingBox, ops: PaintOp[], skipBackground = false) {
  if (box.style.visibility === 'hidden') return;
  if (!skipBackground) paintFormattingBoxBackground(box, ops);
  paintBorders(box.style, box.borderArea, ops);
}

/**
 * Everything inside the border box that belongs to the box's layer
 */
function paintFormattingBoxContent(box: FormattingBox, ops: PaintOp[]) {
  if (box.isReplacedBox()) {
    if (box.style.visibility === 'visible' && box.src) {
      const {x, y, width, height} = box.contentArea;
      ops.push({op: 'image', x, y, width, height, src: box.src});
    }
    return;
  }

  if (!box.isBlockContainer()) return;

  if (box.isBlockContainerOfInlines()) {
    for (const ifc of box.children) paintInlines(ifc, undefined, ops);
    paintMarker(box, ops);
  } else if (box.isBlockContainerOfBlocks()) {
    paintMarker(box, ops);
    for (const child of box.children) {
      if (!child.isStackingContextRoot()) paintFormattingBox(child, ops);
    }
  }
}

function paintFormattingBox(box: FormattingBox, ops: PaintOp[]) {
  paintFormattingBoxOwn(box, ops);
  paintFormattingBoxContent(box, ops);
}

class LayerRoot {
  box: Box;
  negativeRoots: LayerRoot[];
  positiveRoots: LayerRoot[];

  constructor(box: Box) {
    this.box = box;
    this.negativeRoots = [];
    this.positiveRoots = [];
  }

  get zIndex() {
    const zIndex = this.box.style.zIndex;
    return zIndex === 'auto' ? 0 : zIndex;
  }

  /**
   * Array#sort is stable, so ties stay in document order
   */
  finalize() {
    this.negativeRoots.sort((a, b) => a.zIndex - b.zIndex);
    this.positiveRoots.sort((a, b) => a.zIndex - b.zIndex);
  }

  isBlockLayerRoot(): this is BlockLayerRoot {
    return false;
  }

  isInlineLayerRoot(): this is InlineLayerRoot {
    return false;
  }
}

class BlockLayerRoot extends LayerRoot {
  box: FormattingBox;

  constructor(box: FormattingBox) {
    super(box);
    this.box = box;
  }

  isBlockLayerRoot(): this is BlockLayerRoot {
    return true;
  }
}

class InlineLayerRoot extends LayerRoot {
  box: Inline;
  ifc: IfcInline;

  constructor(box: Inline, ifc: IfcInline) {
    super(box);
    this.box = box;
    this.ifc = ifc;
  }

  isInlineLayerRoot(): this is InlineLayerRoot {
    return true;
  }
}

function createLayerRoot(root: BlockContainer) {
  const layerRoot = new BlockLayerRoot(root);
  const layerRoots: LayerRoot[] = [layerRoot];

  const visit = (item: RenderItem, parentRoot: LayerRoot, ifc: IfcInline | undefined) => {
    let layer = parentRoot;

    if (item.isBox() && item !== root && item.isStackingContextRoot()) {
      if (item.isInline()) {
        if (!ifc) throw new Error('Assertion failed');
        layer = new InlineLayerRoot(item, ifc);
      } else if (item.isFormattingBox()) {
        layer = new BlockLayerRoot(item);
      } else {
        throw new Error('Assertion failed');
      }

      if (layer.zIndex < 0) {
        parentRoot.negativeRoots.push(layer);
      } else {
        parentRoot.positiveRoots.push(layer);
      }

      layerRoots.push(layer);
    }

    if (item.isIfcInline()) ifc = item;

    if (item.isBlockContainer() || item.isInline()) {
      for (const child of item.children) visit(child, layer, ifc);
    }
  };

  for (const child of root.children) visit(child, layerRoot, undefined);

  for (const r of layerRoots) r.finalize();

  return layerRoot;
}

function paintBlockLayerRoot(root: BlockLayerRoot, ops: PaintOp[], isRoot = false) {
  paintFormattingBoxOwn(root.box, ops, isRoot);

  for (const r of root.negativeRoots) paintLayerRoot(r, ops);

  paintFormattingBoxContent(root.box, ops);

  for (const r of root.positiveRoots) paintLayerRoot(r, ops);
}

function paintInlineLayerRoot(root: InlineLayerRoot, ops: PaintOp[]) {
  for (const r of root.negativeRoots) paintLayerRoot(r, ops);

  paintInlines(root.ifc, root.box, ops);

  for (const r of root.positiveRoots) paintLayerRoot(r, ops);
}

function paintLayerRoot(root: LayerRoot, ops: PaintOp[]) {
  if (root.isBlockLayerRoot()) {
    paintBlockLayerRoot(root, ops);
  } else if (root.isInlineLayerRoot()) {
    paintInlineLayerRoot(root, ops);
  }
}

/**
 * Paint the root element
 * https://www.w3.org/TR/CSS22/zindex.html
 */
export function paint(root: BlockContainer, viewport: Viewport): DisplayList {
  const ops: PaintOp[] = [];
  const layerRoot = createLayerRoot(root);

  // Propagate background color to the viewport
  fillRect(
    {x: 0, y: 0, width: viewport.width, height: viewport.height},
    root.style.backgroundColor,
    ops
  );

  paintBlockLayerRoot(layerRoot, ops, true);

  return Object.freeze(ops);
}
