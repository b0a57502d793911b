import {dom} from '../src/dom.js';
import {pipeline} from '../src/api.js';
import {boxes} from '../src/layout-flow.js';
import {FixedMetricsProvider} from '../src/text-measure.js';

import type {ElementDescription, HTMLElement} from '../src/dom.js';
import type {BlockContainer, IfcInline, Inline, Viewport} from '../src/layout-flow.js';
import type {FormattingBox} from '../src/layout-box.js';
import type {LoggerOptions} from '../src/util.js';

export const red = {r: 255, g: 0, b: 0, a: 1};
export const green = {r: 0, g: 128, b: 0, a: 1};
export const blue = {r: 0, g: 0, b: 255, a: 1};
export const black = {r: 0, g: 0, b: 0, a: 1};

export function render(
  root: ElementDescription,
  stylesheet = '',
  viewport: Viewport = {width: 1200, height: 800},
  log?: LoggerOptions
) {
  const document = dom(root);
  const measurement = new FixedMetricsProvider();
  return {document, ...pipeline({document, stylesheet, viewport, measurement, log})};
}

export function el(document: {query(selector: string): HTMLElement | null}, selector: string) {
  const found = document.query(selector);
  if (!found) throw new Error(`No element matches ${selector}`);
  return found;
}

export function blockOf(root: BlockContainer, element: HTMLElement): FormattingBox {
  for (const box of boxes(root)) {
    if (box.node === element.id && box.isFormattingBox()) return box;
  }
  throw new Error(`No formatting box for <${element.tagName}>`);
}

export function inlineOf(root: BlockContainer, element: HTMLElement): Inline {
  for (const box of boxes(root)) {
    if (box.node === element.id && box.isInline()) return box;
  }
  throw new Error(`No inline box for <${element.tagName}>`);
}

export function ifcOf(box: FormattingBox): IfcInline {
  if (!box.isBlockContainer()) throw new Error(`Box ${box.id} is not a block container`);
  const [ifc] = box.children;
  if (!ifc || !ifc.isIfcInline()) throw new Error(`Box ${box.id} has no inline content`);
  return ifc;
}

export function rect(box: FormattingBox) {
  const {x, y, width, height} = box.borderArea;
  return {x, y, width, height};
}
