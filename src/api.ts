import {resolveStyles, Stylesheet} from './cascade.js';
import {parseStylesheet} from './parse-css.js';
import {Diagnostics} from './diagnostics.js';
import {createEnvironment} from './environment.js';
import {layout} from './layout-flow.js';
import {paint} from './paint.js';
import {replay} from './display-list.js';
import {SvgRenderer} from './paint-svg.js';

import type {Document} from './dom.js';
import type {StyleTree} from './cascade.js';
import type {Diagnostic} from './diagnostics.js';
import type {Environment} from './environment.js';
import type {BlockContainer, Viewport} from './layout-flow.js';
import type {DisplayList} from './display-list.js';
import type {MeasurementProvider} from './text-measure.js';
import type {LoggerOptions} from './util.js';

export {Document, HTMLElement, TextNode, NO_NODE, h, t, dom} from './dom.js';
export type {DocNode, NodeId, ElementDescription, TextDescription} from './dom.js';

export {
  Stylesheet,
  StyleRule,
  StyleResolver,
  resolveStyles,
  createRules,
  createDeclaration,
  specificity,
  compareSpecificity
} from './cascade.js';
export type {StyleTree, Specificity, Declaration, ResolverOptions} from './cascade.js';

export {parseStylesheet, parseDeclarationList} from './parse-css.js';
export {Style, initialStyle} from './style.js';
export type {Color, BorderStyle, Display, Position, DeclaredStyle} from './style.js';

export {Diagnostics} from './diagnostics.js';
export type {Diagnostic, DiagnosticKind} from './diagnostics.js';

export {defaultEnvironment, createEnvironment} from './environment.js';
export type {Environment} from './environment.js';

export {FixedMetricsProvider, Measurer, fontToCss} from './text-measure.js';
export type {FontDescriptor, LineMetrics, MeasurementProvider, FixedMetricsOptions} from './text-measure.js';

export {BoxArea, FormattingBox} from './layout-box.js';
export {BlockContainer, Inline, IfcInline, Break, layout, boxes, LOG_ATTRIBUTE} from './layout-flow.js';
export type {Viewport, ListMarker, LayoutOptions, LayoutResult} from './layout-flow.js';
export {ReplacedBox} from './layout-image.js';
export type {Linebox, TextFragment, BackgroundBox} from './layout-text.js';

export {paint} from './paint.js';
export {replay} from './display-list.js';
export type {DisplayList, PaintOp, Renderer, Side} from './display-list.js';
export {SvgRenderer} from './paint-svg.js';
export {Logger} from './util.js';
export type {LoggerOptions, TreeLogOptions} from './util.js';

export interface PipelineInput {
  document: Document;
  /** rules, or stylesheet text to parse */
  stylesheet: Stylesheet | string;
  viewport: Viewport;
  measurement: MeasurementProvider;
  /** merged over defaultEnvironment */
  environment?: Partial<Environment>;
  /** output of the x-stylebox-log attribute */
  log?: LoggerOptions;
}

export interface PipelineResult {
  styles: StyleTree;
  layout: BlockContainer;
  displayList: DisplayList;
  diagnostics: readonly Diagnostic[];
}

/**
 * Styles, lays out and paints the document from scratch. Nothing is kept
 * between calls, so call it again whenever the document, the stylesheet or
 * the viewport changes.
 */
export function pipeline(input: PipelineInput): PipelineResult {
  const diagnostics = new Diagnostics();
  const environment = createEnvironment(input.environment);
  const {document, viewport} = input;
  const stylesheet = typeof input.stylesheet === 'string'
    ? parseStylesheet(input.stylesheet, diagnostics)
    : input.stylesheet;

  const styles = resolveStyles(document, stylesheet, {viewport, diagnostics, environment});
  const {root} = layout(document, styles, viewport, input.measurement, {
    diagnostics,
    environment,
    log: input.log
  });
  const displayList = paint(root, viewport);

  return {styles, layout: root, displayList, diagnostics: diagnostics.toArray()};
}

export function paintToSvg(displayList: DisplayList, viewport: Viewport): string {
  const renderer = new SvgRenderer();
  replay(displayList, renderer, viewport);
  return renderer.toString();
}
