import type {BorderStyle, Color} from './style.js';
import type {FontDescriptor} from './text-measure.js';
import type {Viewport} from './layout-flow.js';

export type Side = 'top' | 'right' | 'bottom' | 'left';

export interface FillRectOp {
  op: 'fillRect';
  x: number;
  y: number;
  width: number;
  height: number;
  color: Color;
}

/**
 * One side of a border. The line runs from (x1, y1) to (x2, y2) through the
 * middle of the border band and is `width` thick.
 */
export interface StrokeBorderOp {
  op: 'strokeBorder';
  side: Side;
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  width: number;
  style: BorderStyle;
  color: Color;
}

export interface DrawTextOp {
  op: 'drawText';
  x: number;
  /** y of the baseline */
  y: number;
  text: string;
  font: FontDescriptor;
  color: Color;
}

/**
 * Where an embedded image, video, canvas or frame goes. Renderers decide what
 * to draw there.
 */
export interface ImageOp {
  op: 'image';
  x: number;
  y: number;
  width: number;
  height: number;
  src: string;
}

export type PaintOp = FillRectOp | StrokeBorderOp | DrawTextOp | ImageOp;

/**
 * Paint operations in painting order, in absolute CSS pixels
 */
export type DisplayList = readonly PaintOp[];

export interface Renderer {
  clear(width: number, height: number): void;
  fillRect(x: number, y: number, width: number, height: number, color: Color): void;
  strokeBorder(
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    width: number,
    style: BorderStyle,
    color: Color
  ): void;
  drawText(x: number, y: number, text: string, font: FontDescriptor, color: Color): void;
  image(x: number, y: number, width: number, height: number, src: string): void;
}

/**
 * Plays the display list into a renderer at the viewport's scale, starting
 * from a cleared target
 */
export function replay(list: DisplayList, renderer: Renderer, viewport: Viewport) {
  const s = viewport.scale ?? 1;

  renderer.clear(viewport.width * s, viewport.height * s);

  for (const op of list) {
    switch (op.op) {
      case 'fillRect':
        renderer.fillRect(op.x * s, op.y * s, op.width * s, op.height * s, op.color);
        break;
      case 'strokeBorder':
        renderer.strokeBorder(
          op.x1 * s,
          op.y1 * s,
          op.x2 * s,
          op.y2 * s,
          op.width * s,
          op.style,
          op.color
        );
        break;
      case 'drawText':
        renderer.drawText(op.x * s, op.y * s, op.text, {...op.font, size: op.font.size * s}, op.color);
        break;
      case 'image':
        renderer.image(op.x * s, op.y * s, op.width * s, op.height * s, op.src);
        break;
    }
  }
}
