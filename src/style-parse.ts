import {parse, generate} from 'css-tree';
import {inherited, initial, inheritedStyle} from './style.js';

import type {CssNode, Value, Raw} from 'css-tree';
import type {
  DeclaredStyle,
  Color,
  Length,
  LengthUnit,
  Percentage,
  BorderStyle,
  StyleProperty
} from './style.js';

type Parser = (nodes: CssNode[], value: Value) => DeclaredStyle | undefined;

// https://www.w3.org/TR/CSS2/syndata.html#color-units
const namedColors: Record<string, Color> = {
  black: {r: 0, g: 0, b: 0, a: 1},
  silver: {r: 192, g: 192, b: 192, a: 1},
  gray: {r: 128, g: 128, b: 128, a: 1},
  grey: {r: 128, g: 128, b: 128, a: 1},
  white: {r: 255, g: 255, b: 255, a: 1},
  maroon: {r: 128, g: 0, b: 0, a: 1},
  red: {r: 255, g: 0, b: 0, a: 1},
  purple: {r: 128, g: 0, b: 128, a: 1},
  fuchsia: {r: 255, g: 0, b: 255, a: 1},
  green: {r: 0, g: 128, b: 0, a: 1},
  lime: {r: 0, g: 255, b: 0, a: 1},
  olive: {r: 128, g: 128, b: 0, a: 1},
  yellow: {r: 255, g: 255, b: 0, a: 1},
  navy: {r: 0, g: 0, b: 128, a: 1},
  blue: {r: 0, g: 0, b: 255, a: 1},
  teal: {r: 0, g: 128, b: 128, a: 1},
  aqua: {r: 0, g: 255, b: 255, a: 1},
  orange: {r: 255, g: 165, b: 0, a: 1},
  transparent: {r: 0, g: 0, b: 0, a: 0}
};

const absoluteSizes: Record<string, number> = {
  'xx-small': 9,
  'x-small': 10,
  'small': 13,
  'medium': 16,
  'large': 18,
  'x-large': 24,
  'xx-large': 32
};

const borderWidths: Record<string, number> = {thin: 1, medium: 3, thick: 5};

const relativeUnits = new Set<string>(['em', 'rem', 'vw', 'vh', 'vmin', 'vmax']);

function isLengthUnit(unit: string): unit is LengthUnit {
  return relativeUnits.has(unit);
}

function ident(node: CssNode | undefined) {
  return node && node.type === 'Identifier' ? node.name.toLowerCase() : undefined;
}

function isSlash(node: CssNode | undefined) {
  return node !== undefined && node.type === 'Operator' && node.value === '/';
}

function length(node: CssNode | undefined): Length | undefined {
  if (!node) return;
  if (node.type === 'Number') {
    const n = Number(node.value);
    return n === 0 ? 0 : undefined;
  }
  if (node.type !== 'Dimension') return;
  const n = Number(node.value);
  const unit = node.unit.toLowerCase();
  if (!Number.isFinite(n)) return;
  if (unit === 'px') return n;
  if (unit === 'pt') return n * 4 / 3;
  if (unit === 'pc') return n * 16;
  if (unit === 'in') return n * 96;
  if (unit === 'cm') return n * 96 / 2.54;
  if (unit === 'mm') return n * 96 / 25.4;
  if (isLengthUnit(unit)) return {value: n, unit};
}

function percentage(node: CssNode | undefined): Percentage | undefined {
  if (!node || node.type !== 'Percentage') return;
  const n = Number(node.value);
  if (Number.isFinite(n)) return {value: n, unit: '%'};
}

function lengthPercentage(node: CssNode | undefined) {
  return length(node) ?? percentage(node);
}

function lengthPercentageAuto(node: CssNode | undefined) {
  return ident(node) === 'auto' ? 'auto' as const : lengthPercentage(node);
}

function isNegative(v: Length | Percentage | 'auto') {
  return typeof v === 'number' ? v < 0 : typeof v === 'object' && v.value < 0;
}

function nonNegative<T extends Length | Percentage | 'auto'>(v: T | undefined) {
  return v !== undefined && !isNegative(v) ? v : undefined;
}

function clampByte(n: number) {
  return Math.max(0, Math.min(255, Math.round(n)));
}

function hexColor(hex: string): Color | undefined {
  if (!/^[0-9a-f]+$/i.test(hex)) return;
  let digits = hex;
  if (hex.length === 3 || hex.length === 4) {
    digits = Array.from(hex, c => c + c).join('');
  } else if (hex.length !== 6 && hex.length !== 8) {
    return;
  }
  const r = parseInt(digits.slice(0, 2), 16);
  const g = parseInt(digits.slice(2, 4), 16);
  const b = parseInt(digits.slice(4, 6), 16);
  const a = digits.length === 8 ? parseInt(digits.slice(6, 8), 16) / 255 : 1;
  return {r, g, b, a};
}

// rgb(1, 2, 3), rgba(1, 2, 3, 0.5), rgb(1 2 3 / 50%)
function rgbColor(args: CssNode[]): Color | undefined {
  const values = args.filter(n => n.type !== 'Operator' || n.value === '/');
  const slash = values.findIndex(isSlash);
  const channels = slash > -1 ? values.slice(0, slash) : values.slice(0, 3);
  const alphaNode = slash > -1 ? values[slash + 1] : values[3];
  if (channels.length !== 3) return;
  if (slash > -1 ? values.length !== 5 : values.length > 4) return;

  const rgb: number[] = [];
  for (const channel of channels) {
    if (channel.type === 'Number') {
      rgb.push(clampByte(Number(channel.value)));
    } else if (channel.type === 'Percentage') {
      rgb.push(clampByte(Number(channel.value) / 100 * 255));
    } else {
      return;
    }
  }

  let a = 1;
  if (alphaNode) {
    if (alphaNode.type === 'Number') {
      a = Number(alphaNode.value);
    } else if (alphaNode.type === 'Percentage') {
      a = Number(alphaNode.value) / 100;
    } else {
      return;
    }
  }

  if (rgb.some(c => Number.isNaN(c)) || Number.isNaN(a)) return;

  return {r: rgb[0], g: rgb[1], b: rgb[2], a: Math.max(0, Math.min(1, a))};
}

function color(node: CssNode | undefined): Color | undefined {
  if (!node) return;
  if (node.type === 'Hash') return hexColor(node.value);
  if (node.type === 'Identifier') {
    const name = node.name.toLowerCase();
    return Object.prototype.hasOwnProperty.call(namedColors, name) ? namedColors[name] : undefined;
  }
  if (node.type === 'Function') {
    const name = node.name.toLowerCase();
    if (name === 'rgb' || name === 'rgba') {
      return rgbColor(node.children.toArray().filter(n => n.type !== 'WhiteSpace'));
    }
  }
}

function borderStyle(node: CssNode | undefined): BorderStyle | undefined {
  const name = ident(node);
  if (name === 'none' || name === 'hidden' || name === 'dotted' || name === 'dashed'
    || name === 'solid' || name === 'double' || name === 'groove' || name === 'ridge'
    || name === 'inset' || name === 'outset') {
    return name;
  }
}

function borderWidth(node: CssNode | undefined): Length | undefined {
  const name = ident(node);
  if (name && name in borderWidths) return borderWidths[name];
  const v = length(node);
  return v !== undefined && !isNegative(v) ? v : undefined;
}

function keyword<T extends string>(allowed: readonly T[]) {
  return (node: CssNode | undefined): T | undefined => {
    const name = ident(node);
    return allowed.find(a => a === name);
  };
}

function single<K extends keyof DeclaredStyle>(
  property: K,
  parseOne: (node: CssNode | undefined) => DeclaredStyle[K] | undefined
): Parser {
  return nodes => {
    if (nodes.length !== 1) return;
    const v = parseOne(nodes[0]);
    if (v === undefined) return;
    const style: DeclaredStyle = {};
    style[property] = v;
    return style;
  };
}

type Sides<T> = [T, T, T, T];

// 1-4 values: top, right, bottom, left
function sides<T>(nodes: CssNode[], parseOne: (node: CssNode) => T | undefined): Sides<T> | undefined {
  if (nodes.length < 1 || nodes.length > 4) return;
  const values: T[] = [];
  for (const node of nodes) {
    const v = parseOne(node);
    if (v === undefined) return;
    values.push(v);
  }
  const [top, right = top, bottom = top, left = right] = values;
  return [top, right, bottom, left];
}

const marginValue = (node: CssNode) => lengthPercentageAuto(node);
const paddingValue = (node: CssNode) => nonNegative(lengthPercentage(node));

function fontSize(node: CssNode | undefined): DeclaredStyle['fontSize'] {
  const name = ident(node);
  if (name && name in absoluteSizes) return absoluteSizes[name];
  if (name === 'smaller') return {value: 1 / 1.2, unit: 'em'};
  if (name === 'larger') return {value: 1.2, unit: 'em'};
  return nonNegative(lengthPercentage(node));
}

function fontWeight(node: CssNode | undefined): DeclaredStyle['fontWeight'] {
  const name = ident(node);
  if (name === 'normal' || name === 'bold' || name === 'bolder' || name === 'lighter') return name;
  if (node && node.type === 'Number') {
    const n = Number(node.value);
    if (n >= 1 && n <= 1000) return n;
  }
}

const fontStyle = keyword(['normal', 'italic', 'oblique'] as const);

function lineHeight(node: CssNode | undefined): DeclaredStyle['lineHeight'] {
  if (ident(node) === 'normal') return 'normal';
  if (node && node.type === 'Number') {
    const n = Number(node.value);
    if (n >= 0) return {value: n, unit: null};
    return;
  }
  return nonNegative(lengthPercentage(node));
}

function fontFamily(nodes: CssNode[]): string[] | undefined {
  const families: string[] = [];
  let words: string[] = [];

  const flush = () => {
    if (words.length === 0) return false;
    families.push(words.join(' '));
    words = [];
    return true;
  };

  for (const node of nodes) {
    if (node.type === 'Operator' && node.value === ',') {
      if (!flush()) return;
    } else if (node.type === 'String') {
      if (words.length) return;
      words.push(node.value);
    } else if (node.type === 'Identifier') {
      words.push(node.name);
    } else if (node.type !== 'WhiteSpace') {
      return;
    }
  }

  if (!flush()) return;
  return families;
}

// [ style || weight ]? size [ / line-height ]? family
function font(_nodes: CssNode[], value: Value): DeclaredStyle | undefined {
  const all = value.children.toArray();
  const style: DeclaredStyle = {fontStyle: 'normal', fontWeight: 'normal', lineHeight: 'normal'};
  let i = 0;

  for (; i < all.length; i++) {
    const node = all[i];
    if (node.type === 'WhiteSpace') continue;
    const name = ident(node);
    if (name === 'normal') continue;
    const fs = fontStyle(node);
    if (fs) {
      style.fontStyle = fs;
      continue;
    }
    if (name !== 'larger' && name !== 'smaller' && !(name && name in absoluteSizes)) {
      const fw = fontWeight(node);
      if (fw !== undefined) {
        style.fontWeight = fw;
        continue;
      }
    }
    break;
  }

  const size = fontSize(all[i]);
  if (size === undefined) return;
  style.fontSize = size;
  i++;

  while (all[i] && all[i].type === 'WhiteSpace') i++;
  if (isSlash(all[i])) {
    i++;
    while (all[i] && all[i].type === 'WhiteSpace') i++;
    const lh = lineHeight(all[i]);
    if (lh === undefined) return;
    style.lineHeight = lh;
    i++;
  }

  const families = fontFamily(all.slice(i));
  if (!families) return;
  style.fontFamily = families;

  return style;
}

function margin(nodes: CssNode[]): DeclaredStyle | undefined {
  const v = sides(nodes, marginValue);
  if (!v) return;
  return {marginTop: v[0], marginRight: v[1], marginBottom: v[2], marginLeft: v[3]};
}

function padding(nodes: CssNode[]): DeclaredStyle | undefined {
  const v = sides(nodes, paddingValue);
  if (!v) return;
  return {paddingTop: v[0], paddingRight: v[1], paddingBottom: v[2], paddingLeft: v[3]};
}

function borderWidthShorthand(nodes: CssNode[]): DeclaredStyle | undefined {
  const v = sides(nodes, borderWidth);
  if (!v) return;
  return {borderTopWidth: v[0], borderRightWidth: v[1], borderBottomWidth: v[2], borderLeftWidth: v[3]};
}

function borderStyleShorthand(nodes: CssNode[]): DeclaredStyle | undefined {
  const v = sides(nodes, borderStyle);
  if (!v) return;
  return {borderTopStyle: v[0], borderRightStyle: v[1], borderBottomStyle: v[2], borderLeftStyle: v[3]};
}

function borderColor(node: CssNode | undefined): Color | 'currentcolor' | undefined {
  if (ident(node) === 'currentcolor') return 'currentcolor';
  return color(node);
}

function borderColorShorthand(nodes: CssNode[]): DeclaredStyle | undefined {
  const v = sides(nodes, borderColor);
  if (!v) return;
  return {borderTopColor: v[0], borderRightColor: v[1], borderBottomColor: v[2], borderLeftColor: v[3]};
}

type Side = 'Top' | 'Right' | 'Bottom' | 'Left';

// <line-width> || <line-style> || <color>
function borderSide(nodes: CssNode[], sideNames: Side[]): DeclaredStyle | undefined {
  let width: Length | undefined;
  let style: BorderStyle | undefined;
  let c: Color | 'currentcolor' | undefined;

  if (nodes.length < 1 || nodes.length > 3) return;

  for (const node of nodes) {
    const w = width === undefined ? borderWidth(node) : undefined;
    if (w !== undefined) {
      width = w;
      continue;
    }
    const s = style === undefined ? borderStyle(node) : undefined;
    if (s !== undefined) {
      style = s;
      continue;
    }
    const bc = c === undefined ? borderColor(node) : undefined;
    if (bc !== undefined) {
      c = bc;
      continue;
    }
    return;
  }

  // Omitted values are reset to their initial values
  const ret: DeclaredStyle = {};
  for (const side of sideNames) {
    ret[`border${side}Width`] = width ?? 3;
    ret[`border${side}Style`] = style ?? 'none';
    ret[`border${side}Color`] = c ?? 'currentcolor';
  }
  return ret;
}

function background(nodes: CssNode[]): DeclaredStyle | undefined {
  let backgroundColor: Color = namedColors.transparent;
  for (const node of nodes) {
    const c = color(node);
    if (c) backgroundColor = c;
  }
  return {backgroundColor};
}

function textDecorationLine(nodes: CssNode[], strict: boolean): DeclaredStyle | undefined {
  let underline = false;
  let lineThrough = false;
  let none = false;
  for (const node of nodes) {
    const name = ident(node);
    if (name === 'none') {
      none = true;
    } else if (name === 'underline') {
      underline = true;
    } else if (name === 'line-through') {
      lineThrough = true;
    } else if (name === 'overline' || !strict) {
      // overline isn't painted, and the shorthand's color/style are ignored
    } else {
      return;
    }
  }
  if (none && (underline || lineThrough)) return;
  return {textDecorationLine: {underline, lineThrough}};
}

const listStyleTypes = ['disc', 'circle', 'square', 'decimal', 'none'] as const;
const listStyleType = keyword(listStyleTypes);

function listStyle(nodes: CssNode[]): DeclaredStyle | undefined {
  let type: DeclaredStyle['listStyleType'];
  for (const node of nodes) {
    const t = listStyleType(node);
    if (t) {
      type = t;
    } else if (ident(node) !== 'inside' && ident(node) !== 'outside') {
      return;
    }
  }
  return {listStyleType: type ?? 'disc'};
}

function display(node: CssNode | undefined): DeclaredStyle['display'] {
  switch (ident(node)) {
    case 'block': return {outer: 'block', inner: 'flow', listItem: false};
    case 'inline': return {outer: 'inline', inner: 'flow', listItem: false};
    case 'inline-block': return {outer: 'inline', inner: 'flow-root', listItem: false};
    case 'flow-root': return {outer: 'block', inner: 'flow-root', listItem: false};
    case 'list-item': return {outer: 'block', inner: 'flow', listItem: true};
    case 'none': return {outer: 'none', inner: 'none', listItem: false};
  }
}

function textAlign(node: CssNode | undefined): DeclaredStyle['textAlign'] {
  const name = ident(node);
  if (name === 'left' || name === 'right' || name === 'center' || name === 'start' || name === 'end') {
    return name;
  }
  if (name === 'justify') return 'start';
}

function visibility(node: CssNode | undefined): DeclaredStyle['visibility'] {
  const name = ident(node);
  if (name === 'visible' || name === 'hidden') return name;
  if (name === 'collapse') return 'hidden';
}

function zIndex(node: CssNode | undefined): DeclaredStyle['zIndex'] {
  if (ident(node) === 'auto') return 'auto';
  if (node && node.type === 'Number' && /^[+-]?\d+$/.test(node.value)) return Number(node.value);
}

function tabSize(node: CssNode | undefined): DeclaredStyle['tabSize'] {
  if (node && node.type === 'Number') {
    const n = Number(node.value);
    return n >= 0 ? {value: n, unit: null} : undefined;
  }
  const v = length(node);
  return v !== undefined && !isNegative(v) ? v : undefined;
}

const parsers = new Map<string, Parser>([
  ['display', single('display', display)],
  ['position', single('position', keyword(['static', 'relative', 'absolute', 'fixed'] as const))],
  ['white-space', single('whiteSpace', keyword(['normal', 'nowrap', 'pre', 'pre-wrap', 'pre-line'] as const))],
  ['color', single('color', color)],
  ['background-color', single('backgroundColor', color)],
  ['background-clip', single('backgroundClip', keyword(['border-box', 'padding-box', 'content-box'] as const))],
  ['background', background],
  ['font-size', single('fontSize', fontSize)],
  ['font-weight', single('fontWeight', fontWeight)],
  ['font-style', single('fontStyle', fontStyle)],
  ['font-family', (_nodes, value) => {
    const families = fontFamily(value.children.toArray());
    return families && {fontFamily: families};
  }],
  ['font', font],
  ['line-height', single('lineHeight', lineHeight)],
  ['margin', margin],
  ['margin-top', single('marginTop', lengthPercentageAuto)],
  ['margin-right', single('marginRight', lengthPercentageAuto)],
  ['margin-bottom', single('marginBottom', lengthPercentageAuto)],
  ['margin-left', single('marginLeft', lengthPercentageAuto)],
  ['padding', padding],
  ['padding-top', single('paddingTop', n => nonNegative(lengthPercentage(n)))],
  ['padding-right', single('paddingRight', n => nonNegative(lengthPercentage(n)))],
  ['padding-bottom', single('paddingBottom', n => nonNegative(lengthPercentage(n)))],
  ['padding-left', single('paddingLeft', n => nonNegative(lengthPercentage(n)))],
  ['border', nodes => borderSide(nodes, ['Top', 'Right', 'Bottom', 'Left'])],
  ['border-top', nodes => borderSide(nodes, ['Top'])],
  ['border-right', nodes => borderSide(nodes, ['Right'])],
  ['border-bottom', nodes => borderSide(nodes, ['Bottom'])],
  ['border-left', nodes => borderSide(nodes, ['Left'])],
  ['border-width', borderWidthShorthand],
  ['border-style', borderStyleShorthand],
  ['border-color', borderColorShorthand],
  ['border-top-width', single('borderTopWidth', borderWidth)],
  ['border-right-width', single('borderRightWidth', borderWidth)],
  ['border-bottom-width', single('borderBottomWidth', borderWidth)],
  ['border-left-width', single('borderLeftWidth', borderWidth)],
  ['border-top-style', single('borderTopStyle', borderStyle)],
  ['border-right-style', single('borderRightStyle', borderStyle)],
  ['border-bottom-style', single('borderBottomStyle', borderStyle)],
  ['border-left-style', single('borderLeftStyle', borderStyle)],
  ['border-top-color', single('borderTopColor', borderColor)],
  ['border-right-color', single('borderRightColor', borderColor)],
  ['border-bottom-color', single('borderBottomColor', borderColor)],
  ['border-left-color', single('borderLeftColor', borderColor)],
  ['tab-size', single('tabSize', tabSize)],
  ['width', single('width', n => nonNegative(lengthPercentageAuto(n)))],
  ['height', single('height', n => nonNegative(lengthPercentageAuto(n)))],
  ['top', single('top', lengthPercentageAuto)],
  ['right', single('right', lengthPercentageAuto)],
  ['bottom', single('bottom', lengthPercentageAuto)],
  ['left', single('left', lengthPercentageAuto)],
  ['box-sizing', single('boxSizing', keyword(['content-box', 'border-box'] as const))],
  ['text-align', single('textAlign', textAlign)],
  ['text-decoration', nodes => textDecorationLine(nodes, false)],
  ['text-decoration-line', nodes => textDecorationLine(nodes, true)],
  ['visibility', single('visibility', visibility)],
  ['list-style-type', single('listStyleType', listStyleType)],
  ['list-style', listStyle],
  ['z-index', single('zIndex', zIndex)]
]);

// Longhands each property sets, for the CSS-wide keywords
const longhands = new Map<string, StyleProperty[]>([
  ['background', ['backgroundColor']],
  ['font', ['fontStyle', 'fontWeight', 'fontSize', 'lineHeight', 'fontFamily']],
  ['margin', ['marginTop', 'marginRight', 'marginBottom', 'marginLeft']],
  ['padding', ['paddingTop', 'paddingRight', 'paddingBottom', 'paddingLeft']],
  ['border', [
    'borderTopWidth', 'borderRightWidth', 'borderBottomWidth', 'borderLeftWidth',
    'borderTopStyle', 'borderRightStyle', 'borderBottomStyle', 'borderLeftStyle',
    'borderTopColor', 'borderRightColor', 'borderBottomColor', 'borderLeftColor'
  ]],
  ['border-width', ['borderTopWidth', 'borderRightWidth', 'borderBottomWidth', 'borderLeftWidth']],
  ['border-style', ['borderTopStyle', 'borderRightStyle', 'borderBottomStyle', 'borderLeftStyle']],
  ['border-color', ['borderTopColor', 'borderRightColor', 'borderBottomColor', 'borderLeftColor']],
  ['border-top', ['borderTopWidth', 'borderTopStyle', 'borderTopColor']],
  ['border-right', ['borderRightWidth', 'borderRightStyle', 'borderRightColor']],
  ['border-bottom', ['borderBottomWidth', 'borderBottomStyle', 'borderBottomColor']],
  ['border-left', ['borderLeftWidth', 'borderLeftStyle', 'borderLeftColor']],
  ['text-decoration', ['textDecorationLine']],
  ['list-style', ['listStyleType']]
]);

function camelCase(property: string) {
  return property.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase());
}

function isStyleProperty(name: string): name is StyleProperty {
  return Object.prototype.hasOwnProperty.call(inheritedStyle, name);
}

function longhandsOf(property: string): StyleProperty[] {
  const list = longhands.get(property);
  if (list) return list;
  const name = camelCase(property);
  return isStyleProperty(name) ? [name] : [];
}

/**
 * Whether the property maps onto a field of the computed style. Anything
 * else is kept as text in Style.extra.
 */
export function isModeledProperty(property: string) {
  return parsers.has(property.toLowerCase());
}

/**
 * Parses a value already tokenized by css-tree. Returns undefined when the
 * value isn't valid for the property (or the property is unknown).
 */
export function parseDeclaration(property: string, value: Value | Raw): DeclaredStyle | undefined {
  property = property.toLowerCase();
  const parser = parsers.get(property);
  if (!parser) return;

  let parsed: Value;
  if (value.type === 'Raw') {
    const reparsed = parseValueText(value.value);
    if (!reparsed) return;
    parsed = reparsed;
  } else {
    parsed = value;
  }

  const nodes = parsed.children.toArray().filter(node => node.type !== 'WhiteSpace');

  if (nodes.length === 1) {
    const name = ident(nodes[0]);
    if (name === 'inherit' || name === 'initial' || name === 'unset') {
      const style: DeclaredStyle = {};
      for (const p of longhandsOf(property)) {
        const inherit = name === 'inherit' || name === 'unset' && inheritedStyle[p];
        setKeyword(style, p, inherit ? inherited : initial);
      }
      return style;
    }
  }

  return parser(nodes, parsed);
}

function setKeyword(style: DeclaredStyle, p: StyleProperty, v: typeof inherited | typeof initial) {
  style[p] = v;
}

function parseValueText(text: string): Value | undefined {
  let failed = false;
  const ast = parse(text, {
    context: 'value',
    onParseError() {
      failed = true;
    }
  });
  if (failed || ast.type !== 'Value') return;
  return ast;
}

/**
 * Convenience for parsing a single property from text, e.g. in tests
 */
export function parsePropertyValue(property: string, text: string) {
  const value = parseValueText(text);
  return value && parseDeclaration(property, value);
}

export function valueText(value: Value | Raw) {
  return value.type === 'Raw' ? value.value.trim() : generate(value);
}
