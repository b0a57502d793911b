import type {FontDescriptor} from './text-measure.js';

export const inherited = Symbol('inherited');

type Inherited = typeof inherited;

export const initial = Symbol('initial');

type Initial = typeof initial;

export type WhiteSpace = 'normal' | 'nowrap' | 'pre-wrap' | 'pre-line' | 'pre';

export type LengthUnit = 'em' | 'rem' | 'vw' | 'vh' | 'vmin' | 'vmax';

export type Length = number | {value: number, unit: LengthUnit};

export type Percentage = {value: number, unit: '%'};

type Number = {value: number, unit: null};

type FontWeight = number | 'normal' | 'bold' | 'bolder' | 'lighter';

type FontStyle = 'normal' | 'italic' | 'oblique';

type BackgroundClip = 'border-box' | 'padding-box' | 'content-box';

export type OuterDisplay = 'inline' | 'block' | 'none';

export type InnerDisplay = 'flow' | 'flow-root' | 'none';

export type Display = {outer: OuterDisplay, inner: InnerDisplay, listItem: boolean};

export type Position = 'absolute' | 'relative' | 'static' | 'fixed';

export type Color = {r: number, g: number, b: number, a: number};

export type BorderStyle = 'none' | 'hidden' | 'dotted' | 'dashed' | 'solid'
  | 'double' | 'groove' | 'ridge' | 'inset' | 'outset';

type BoxSizing = 'border-box' | 'content-box';

export type TextAlign = 'start' | 'end' | 'left' | 'right' | 'center';

export type TextDecorationLine = {underline: boolean, lineThrough: boolean};

export type Visibility = 'visible' | 'hidden';

export type ListStyleType = 'disc' | 'circle' | 'square' | 'decimal' | 'none';

type Cascaded<T> = T | Inherited | Initial;

export interface DeclaredStyle {
  whiteSpace?: Cascaded<WhiteSpace>;
  color?: Cascaded<Color>;
  fontSize?: Cascaded<Length | Percentage>;
  fontWeight?: Cascaded<FontWeight>;
  fontStyle?: Cascaded<FontStyle>;
  fontFamily?: Cascaded<string[]>;
  lineHeight?: Cascaded<'normal' | Length | Percentage | Number>;
  backgroundColor?: Cascaded<Color>;
  backgroundClip?: Cascaded<BackgroundClip>;
  display?: Cascaded<Display>;
  borderTopWidth?: Cascaded<Length>;
  borderRightWidth?: Cascaded<Length>;
  borderBottomWidth?: Cascaded<Length>;
  borderLeftWidth?: Cascaded<Length>;
  borderTopStyle?: Cascaded<BorderStyle>;
  borderRightStyle?: Cascaded<BorderStyle>;
  borderBottomStyle?: Cascaded<BorderStyle>;
  borderLeftStyle?: Cascaded<BorderStyle>;
  borderTopColor?: Cascaded<Color | 'currentcolor'>;
  borderRightColor?: Cascaded<Color | 'currentcolor'>;
  borderBottomColor?: Cascaded<Color | 'currentcolor'>;
  borderLeftColor?: Cascaded<Color | 'currentcolor'>;
  paddingTop?: Cascaded<Length | Percentage>;
  paddingRight?: Cascaded<Length | Percentage>;
  paddingBottom?: Cascaded<Length | Percentage>;
  paddingLeft?: Cascaded<Length | Percentage>;
  marginTop?: Cascaded<Length | Percentage | 'auto'>;
  marginRight?: Cascaded<Length | Percentage | 'auto'>;
  marginBottom?: Cascaded<Length | Percentage | 'auto'>;
  marginLeft?: Cascaded<Length | Percentage | 'auto'>;
  tabSize?: Cascaded<Length | Number>;
  position?: Cascaded<Position>;
  width?: Cascaded<Length | Percentage | 'auto'>;
  height?: Cascaded<Length | Percentage | 'auto'>;
  top?: Cascaded<Length | Percentage | 'auto'>;
  right?: Cascaded<Length | Percentage | 'auto'>;
  bottom?: Cascaded<Length | Percentage | 'auto'>;
  left?: Cascaded<Length | Percentage | 'auto'>;
  boxSizing?: Cascaded<BoxSizing>;
  textAlign?: Cascaded<TextAlign>;
  textDecorationLine?: Cascaded<TextDecorationLine>;
  visibility?: Cascaded<Visibility>;
  listStyleType?: Cascaded<ListStyleType>;
  zIndex?: Cascaded<number | 'auto'>;
}

export const EMPTY_STYLE: DeclaredStyle = Object.freeze({});

export type CascadedStyle = DeclaredStyle;

/**
 * CSS Cascading and Inheritance Level 4 § 4.4. Relative lengths are pixels,
 * percentages survive until layout resolves them against a containing block.
 */
export interface ComputedPlainStyle {
  whiteSpace: WhiteSpace;
  color: Color;
  fontSize: number;
  fontWeight: number;
  fontStyle: FontStyle;
  fontFamily: string[];
  lineHeight: 'normal' | number | Number;
  backgroundColor: Color;
  backgroundClip: BackgroundClip;
  display: Display;
  borderTopWidth: number;
  borderRightWidth: number;
  borderBottomWidth: number;
  borderLeftWidth: number;
  borderTopStyle: BorderStyle;
  borderRightStyle: BorderStyle;
  borderBottomStyle: BorderStyle;
  borderLeftStyle: BorderStyle;
  borderTopColor: Color;
  borderRightColor: Color;
  borderBottomColor: Color;
  borderLeftColor: Color;
  paddingTop: number | Percentage;
  paddingRight: number | Percentage;
  paddingBottom: number | Percentage;
  paddingLeft: number | Percentage;
  marginTop: number | Percentage | 'auto';
  marginRight: number | Percentage | 'auto';
  marginBottom: number | Percentage | 'auto';
  marginLeft: number | Percentage | 'auto';
  tabSize: number | Number;
  position: Position;
  width: number | Percentage | 'auto';
  height: number | Percentage | 'auto';
  top: number | Percentage | 'auto';
  right: number | Percentage | 'auto';
  bottom: number | Percentage | 'auto';
  left: number | Percentage | 'auto';
  boxSizing: BoxSizing;
  textAlign: TextAlign;
  textDecorationLine: TextDecorationLine;
  visibility: Visibility;
  listStyleType: ListStyleType;
  zIndex: number | 'auto';
}

export type StyleProperty = keyof ComputedPlainStyle;

function percentGtZero(cssVal: number | Percentage) {
  return typeof cssVal === 'object' ? cssVal.value > 0 : cssVal > 0;
}

export class Style implements ComputedPlainStyle {
  whiteSpace: WhiteSpace;
  color: Color;
  fontSize: number;
  fontWeight: number;
  fontStyle: FontStyle;
  fontFamily: string[];
  lineHeight: ComputedPlainStyle['lineHeight'];
  backgroundColor: Color;
  backgroundClip: BackgroundClip;
  display: Display;
  borderTopWidth: number;
  borderRightWidth: number;
  borderBottomWidth: number;
  borderLeftWidth: number;
  borderTopStyle: BorderStyle;
  borderRightStyle: BorderStyle;
  borderBottomStyle: BorderStyle;
  borderLeftStyle: BorderStyle;
  borderTopColor: Color;
  borderRightColor: Color;
  borderBottomColor: Color;
  borderLeftColor: Color;
  paddingTop: number | Percentage;
  paddingRight: number | Percentage;
  paddingBottom: number | Percentage;
  paddingLeft: number | Percentage;
  marginTop: number | Percentage | 'auto';
  marginRight: number | Percentage | 'auto';
  marginBottom: number | Percentage | 'auto';
  marginLeft: number | Percentage | 'auto';
  tabSize: number | Number;
  position: Position;
  width: number | Percentage | 'auto';
  height: number | Percentage | 'auto';
  top: number | Percentage | 'auto';
  right: number | Percentage | 'auto';
  bottom: number | Percentage | 'auto';
  left: number | Percentage | 'auto';
  boxSizing: BoxSizing;
  textAlign: TextAlign;
  textDecorationLine: TextDecorationLine;
  visibility: Visibility;
  listStyleType: ListStyleType;
  zIndex: number | 'auto';
  /**
   * Cascaded values of properties this record doesn't model, by CSS name.
   * Custom properties (--*) are inherited, others aren't.
   */
  extra: ReadonlyMap<string, string>;

  constructor(style: ComputedPlainStyle, extra: ReadonlyMap<string, string> = new Map()) {
    this.whiteSpace = style.whiteSpace;
    this.color = style.color;
    this.fontSize = style.fontSize;
    this.fontWeight = style.fontWeight;
    this.fontStyle = style.fontStyle;
    this.fontFamily = style.fontFamily;
    this.lineHeight = style.lineHeight;
    this.backgroundColor = style.backgroundColor;
    this.backgroundClip = style.backgroundClip;
    this.display = style.display;
    this.borderTopWidth = style.borderTopWidth;
    this.borderRightWidth = style.borderRightWidth;
    this.borderBottomWidth = style.borderBottomWidth;
    this.borderLeftWidth = style.borderLeftWidth;
    this.borderTopStyle = style.borderTopStyle;
    this.borderRightStyle = style.borderRightStyle;
    this.borderBottomStyle = style.borderBottomStyle;
    this.borderLeftStyle = style.borderLeftStyle;
    this.borderTopColor = style.borderTopColor;
    this.borderRightColor = style.borderRightColor;
    this.borderBottomColor = style.borderBottomColor;
    this.borderLeftColor = style.borderLeftColor;
    this.paddingTop = style.paddingTop;
    this.paddingRight = style.paddingRight;
    this.paddingBottom = style.paddingBottom;
    this.paddingLeft = style.paddingLeft;
    this.marginTop = style.marginTop;
    this.marginRight = style.marginRight;
    this.marginBottom = style.marginBottom;
    this.marginLeft = style.marginLeft;
    this.tabSize = style.tabSize;
    this.position = style.position;
    this.width = style.width;
    this.height = style.height;
    this.top = style.top;
    this.right = style.right;
    this.bottom = style.bottom;
    this.left = style.left;
    this.boxSizing = style.boxSizing;
    this.textAlign = style.textAlign;
    this.textDecorationLine = style.textDecorationLine;
    this.visibility = style.visibility;
    this.listStyleType = style.listStyleType;
    this.zIndex = style.zIndex;
    this.extra = extra;
  }

  /**
   * Used line height for a font whose recommended line height is `normal`
   */
  getLineHeight(normal: number) {
    if (this.lineHeight === 'normal') return normal;
    if (typeof this.lineHeight === 'object') return this.lineHeight.value * this.fontSize;
    return this.lineHeight;
  }

  getTextAlign() {
    if (this.textAlign === 'start') return 'left';
    if (this.textAlign === 'end') return 'right';
    return this.textAlign;
  }

  getTabSize(spaceAdvance: number) {
    if (typeof this.tabSize === 'object') return this.tabSize.value * spaceAdvance;
    return this.tabSize;
  }

  getFont(): FontDescriptor {
    return {
      families: this.fontFamily,
      size: this.fontSize,
      weight: this.fontWeight,
      style: this.fontStyle
    };
  }

  hasPadding() {
    return percentGtZero(this.paddingTop)
      || percentGtZero(this.paddingRight)
      || percentGtZero(this.paddingBottom)
      || percentGtZero(this.paddingLeft);
  }

  hasBorder() {
    return this.getBorderTopWidth() > 0
      || this.getBorderRightWidth() > 0
      || this.getBorderBottomWidth() > 0
      || this.getBorderLeftWidth() > 0;
  }

  hasPaint() {
    return this.backgroundColor.a > 0 || this.hasBorder();
  }

  getBorderTopWidth() {
    if (this.borderTopStyle === 'none' || this.borderTopStyle === 'hidden') return 0;
    return this.borderTopWidth;
  }

  getBorderRightWidth() {
    if (this.borderRightStyle === 'none' || this.borderRightStyle === 'hidden') return 0;
    return this.borderRightWidth;
  }

  getBorderBottomWidth() {
    if (this.borderBottomStyle === 'none' || this.borderBottomStyle === 'hidden') return 0;
    return this.borderBottomWidth;
  }

  getBorderLeftWidth() {
    if (this.borderLeftStyle === 'none' || this.borderLeftStyle === 'hidden') return 0;
    return this.borderLeftWidth;
  }

  isOutOfFlow() {
    return this.position === 'absolute' || this.position === 'fixed';
  }

  isPositioned() {
    return this.position !== 'static';
  }

  /**
   * Positioned boxes with an integer z-index are lifted out of document-order
   * painting
   */
  isStackingContext() {
    return this.isPositioned() && this.zIndex !== 'auto';
  }

  hasLineLeftGap() {
    if (this.marginLeft === 'auto') return false;
    if (typeof this.marginLeft === 'object' && this.marginLeft.value !== 0) return true;
    if (typeof this.marginLeft !== 'object' && this.marginLeft !== 0) return true;
    if (percentGtZero(this.paddingLeft)) return true;
    return this.getBorderLeftWidth() > 0;
  }

  hasLineRightGap() {
    if (this.marginRight === 'auto') return false;
    if (typeof this.marginRight === 'object' && this.marginRight.value !== 0) return true;
    if (typeof this.marginRight !== 'object' && this.marginRight !== 0) return true;
    if (percentGtZero(this.paddingRight)) return true;
    return this.getBorderRightWidth() > 0;
  }
}

const black: Color = Object.freeze({r: 0, g: 0, b: 0, a: 1});
const transparent: Color = Object.freeze({r: 0, g: 0, b: 0, a: 0});

// Initial values for every property. Different properties have different
// initial values as given in their CSS definitions. This is also
// the style that's used as the root style for inheritance. These are the
// "computed value"s as described in CSS Cascading and Inheritance Level 4 § 4.4
const initialPlainStyle: ComputedPlainStyle = Object.freeze({
  whiteSpace: 'normal',
  color: black,
  fontSize: 16,
  fontWeight: 400,
  fontStyle: 'normal',
  fontFamily: ['sans-serif'],
  lineHeight: 'normal',
  backgroundColor: transparent,
  backgroundClip: 'border-box',
  display: Object.freeze({outer: 'inline' as const, inner: 'flow' as const, listItem: false}),
  borderTopWidth: 3,
  borderRightWidth: 3,
  borderBottomWidth: 3,
  borderLeftWidth: 3,
  borderTopStyle: 'none',
  borderRightStyle: 'none',
  borderBottomStyle: 'none',
  borderLeftStyle: 'none',
  borderTopColor: black,
  borderRightColor: black,
  borderBottomColor: black,
  borderLeftColor: black,
  paddingTop: 0,
  paddingRight: 0,
  paddingBottom: 0,
  paddingLeft: 0,
  marginTop: 0,
  marginRight: 0,
  marginBottom: 0,
  marginLeft: 0,
  tabSize: Object.freeze({value: 8, unit: null}),
  position: 'static',
  width: 'auto',
  height: 'auto',
  top: 'auto',
  right: 'auto',
  bottom: 'auto',
  left: 'auto',
  boxSizing: 'content-box',
  textAlign: 'start',
  textDecorationLine: Object.freeze({underline: false, lineThrough: false}),
  visibility: 'visible',
  listStyleType: 'disc',
  zIndex: 'auto'
});

export const initialStyle = new Style(initialPlainStyle);

type InheritedStyleDefinitions = {[K in StyleProperty]: boolean};

// Each CSS property defines whether or not it's inherited
export const inheritedStyle: InheritedStyleDefinitions = Object.freeze({
  whiteSpace: true,
  color: true,
  fontSize: true,
  fontWeight: true,
  fontStyle: true,
  fontFamily: true,
  lineHeight: true,
  backgroundColor: false,
  backgroundClip: false,
  display: false,
  borderTopWidth: false,
  borderRightWidth: false,
  borderBottomWidth: false,
  borderLeftWidth: false,
  borderTopStyle: false,
  borderRightStyle: false,
  borderBottomStyle: false,
  borderLeftStyle: false,
  borderTopColor: false,
  borderRightColor: false,
  borderBottomColor: false,
  borderLeftColor: false,
  paddingTop: false,
  paddingRight: false,
  paddingBottom: false,
  paddingLeft: false,
  marginTop: false,
  marginRight: false,
  marginBottom: false,
  marginLeft: false,
  tabSize: true,
  position: false,
  width: false,
  height: false,
  top: false,
  right: false,
  bottom: false,
  left: false,
  boxSizing: false,
  textAlign: true,
  // not inherited, but decorations propagate to descendants (see computeStyle)
  textDecorationLine: false,
  visibility: true,
  listStyleType: true,
  zIndex: false
});

const block: Display = Object.freeze({outer: 'block', inner: 'flow', listItem: false});
const none: Display = Object.freeze({outer: 'none', inner: 'none', listItem: false});

type UaDeclaredStyles = {[tagName: string]: DeclaredStyle};

export const uaDeclaredStyles: UaDeclaredStyles = Object.freeze({
  html: {display: block},
  body: {
    display: block,
    marginTop: 8,
    marginRight: 8,
    marginBottom: 8,
    marginLeft: 8
  },
  head: {display: none},
  meta: {display: none},
  link: {display: none},
  title: {display: none},
  style: {display: none},
  script: {display: none},
  base: {display: none},
  noscript: {display: none},
  template: {display: none},
  div: {display: block},
  section: {display: block},
  article: {display: block},
  aside: {display: block},
  header: {display: block},
  footer: {display: block},
  nav: {display: block},
  main: {display: block},
  figure: {display: block},
  span: {display: {outer: 'inline', inner: 'flow', listItem: false}},
  p: {
    display: block,
    marginTop: {value: 1, unit: 'em'},
    marginBottom: {value: 1, unit: 'em'}
  },
  blockquote: {
    display: block,
    marginTop: {value: 1, unit: 'em'},
    marginBottom: {value: 1, unit: 'em'},
    marginLeft: 40,
    marginRight: 40
  },
  pre: {
    display: block,
    whiteSpace: 'pre',
    fontFamily: ['monospace'],
    marginTop: {value: 1, unit: 'em'},
    marginBottom: {value: 1, unit: 'em'}
  },
  ul: {
    display: block,
    listStyleType: 'disc',
    marginTop: {value: 1, unit: 'em'},
    marginBottom: {value: 1, unit: 'em'},
    paddingLeft: 40
  },
  ol: {
    display: block,
    listStyleType: 'decimal',
    marginTop: {value: 1, unit: 'em'},
    marginBottom: {value: 1, unit: 'em'},
    paddingLeft: 40
  },
  li: {
    display: {outer: 'block', inner: 'flow', listItem: true}
  },
  strong: {
    fontWeight: 'bolder'
  },
  b: {
    fontWeight: 'bolder'
  },
  em: {
    fontStyle: 'italic'
  },
  i: {
    fontStyle: 'italic'
  },
  u: {
    textDecorationLine: {underline: true, lineThrough: false}
  },
  a: {
    textDecorationLine: {underline: true, lineThrough: false}
  },
  s: {
    textDecorationLine: {underline: false, lineThrough: true}
  },
  h1: {
    fontSize: {value: 2, unit: 'em'},
    display: block,
    marginTop: {value: 0.67, unit: 'em'},
    marginBottom: {value: 0.67, unit: 'em'},
    fontWeight: 'bold'
  },
  h2: {
    fontSize: {value: 1.5, unit: 'em'},
    display: block,
    marginTop: {value: 0.83, unit: 'em'},
    marginBottom: {value: 0.83, unit: 'em'},
    fontWeight: 'bold'
  },
  h3: {
    fontSize: {value: 1.17, unit: 'em'},
    display: block,
    marginTop: {value: 1, unit: 'em'},
    marginBottom: {value: 1, unit: 'em'},
    fontWeight: 'bold'
  },
  h4: {
    display: block,
    marginTop: {value: 1.33, unit: 'em'},
    marginBottom: {value: 1.33, unit: 'em'},
    fontWeight: 'bold'
  },
  h5: {
    fontSize: {value: 0.83, unit: 'em'},
    display: block,
    marginTop: {value: 1.67, unit: 'em'},
    marginBottom: {value: 1.67, unit: 'em'},
    fontWeight: 'bold'
  },
  h6: {
    fontSize: {value: 0.67, unit: 'em'},
    display: block,
    marginTop: {value: 2.33, unit: 'em'},
    marginBottom: {value: 2.33, unit: 'em'},
    fontWeight: 'bold'
  }
});

export function cascadeStyles(s1: DeclaredStyle, s2: DeclaredStyle): CascadedStyle {
  return {...s1, ...s2};
}

/**
 * What relative lengths resolve against besides the element's own font size
 */
export interface ComputeContext {
  viewportWidth: number;
  viewportHeight: number;
  rootFontSize: number;
}

function computeStyle(
  parentStyle: Style,
  style: CascadedStyle,
  extra: ReadonlyMap<string, string>,
  ctx: ComputeContext
) {
  const parent: ComputedPlainStyle = parentStyle;

  // Defaulting: CSS Cascading 4 § 7
  function get<K extends StyleProperty, S>(
    p: K,
    v: S | Inherited | Initial | undefined,
    compute: (v: S) => ComputedPlainStyle[K]
  ): ComputedPlainStyle[K] {
    if (v === inherited || v === undefined && inheritedStyle[p]) return parent[p];
    if (v === initial || v === undefined) return initialPlainStyle[p];
    return compute(v);
  }

  // Compute fontSize first since em values depend on it
  const fontSize = get('fontSize', style.fontSize, v => {
    if (typeof v === 'number') return v;
    if (v.unit === '%' || v.unit === 'em') {
      const factor = v.unit === '%' ? v.value / 100 : v.value;
      return parent.fontSize * factor;
    }
    return absolutify(v.value, v.unit, parent.fontSize);
  });

  function absolutify(value: number, unit: LengthUnit, em: number) {
    switch (unit) {
      case 'em': return value * em;
      case 'rem': return value * ctx.rootFontSize;
      case 'vw': return value / 100 * ctx.viewportWidth;
      case 'vh': return value / 100 * ctx.viewportHeight;
      case 'vmin': return value / 100 * Math.min(ctx.viewportWidth, ctx.viewportHeight);
      case 'vmax': return value / 100 * Math.max(ctx.viewportWidth, ctx.viewportHeight);
    }
  }

  const px = (v: Length) => typeof v === 'number' ? v : absolutify(v.value, v.unit, fontSize);
  const pxOrPercent = (v: Length | Percentage) => {
    if (typeof v === 'object' && v.unit === '%') return v;
    return px(v);
  };
  const pxOrPercentOrAuto = (v: Length | Percentage | 'auto') => {
    return v === 'auto' ? v : pxOrPercent(v);
  };
  const keep = <T>(v: T) => v;

  const color = get('color', style.color, keep);

  const borderColor = (
    p: 'borderTopColor' | 'borderRightColor' | 'borderBottomColor' | 'borderLeftColor'
  ) => {
    const v = style[p];
    if (v === inherited) return parent[p];
    if (v === undefined || v === initial || v === 'currentcolor') return color;
    return v;
  };

  const fontWeight = get('fontWeight', style.fontWeight, v => {
    if (v === 'normal') return 400;
    if (v === 'bold') return 700;
    if (typeof v === 'number') return v;
    // https://www.w3.org/TR/css-fonts-4/#relative-weights
    const bolder = v === 'bolder';
    const pWeight = parent.fontWeight;
    if (pWeight < 100) {
      return bolder ? 400 : pWeight;
    } else if (pWeight >= 100 && pWeight < 350) {
      return bolder ? 400 : 100;
    } else if (pWeight >= 350 && pWeight < 550) {
      return bolder ? 700 : 100;
    } else if (pWeight >= 550 && pWeight < 750) {
      return bolder ? 900 : 400;
    } else if (pWeight >= 750 && pWeight < 900) {
      return bolder ? 900 : 700;
    } else {
      return bolder ? pWeight : 700;
    }
  });

  const lineHeight = get('lineHeight', style.lineHeight, v => {
    if (v === 'normal' || typeof v === 'number') return v;
    if (v.unit === null) return v;
    if (v.unit === '%') return v.value / 100 * fontSize;
    return absolutify(v.value, v.unit, fontSize);
  });

  // Decorations are painted across descendants' text (CSS Text Decoration 3
  // § 2.1), so the computed value accumulates down the tree
  const ownDecoration = get('textDecorationLine', style.textDecorationLine, keep);
  const parentDecoration = parent.textDecorationLine;
  const textDecorationLine = {
    underline: ownDecoration.underline || parentDecoration.underline,
    lineThrough: ownDecoration.lineThrough || parentDecoration.lineThrough
  };

  return new Style({
    whiteSpace: get('whiteSpace', style.whiteSpace, keep),
    color,
    fontSize,
    fontWeight,
    fontStyle: get('fontStyle', style.fontStyle, keep),
    fontFamily: get('fontFamily', style.fontFamily, keep),
    lineHeight,
    backgroundColor: get('backgroundColor', style.backgroundColor, keep),
    backgroundClip: get('backgroundClip', style.backgroundClip, keep),
    display: get('display', style.display, keep),
    borderTopWidth: get('borderTopWidth', style.borderTopWidth, px),
    borderRightWidth: get('borderRightWidth', style.borderRightWidth, px),
    borderBottomWidth: get('borderBottomWidth', style.borderBottomWidth, px),
    borderLeftWidth: get('borderLeftWidth', style.borderLeftWidth, px),
    borderTopStyle: get('borderTopStyle', style.borderTopStyle, keep),
    borderRightStyle: get('borderRightStyle', style.borderRightStyle, keep),
    borderBottomStyle: get('borderBottomStyle', style.borderBottomStyle, keep),
    borderLeftStyle: get('borderLeftStyle', style.borderLeftStyle, keep),
    borderTopColor: borderColor('borderTopColor'),
    borderRightColor: borderColor('borderRightColor'),
    borderBottomColor: borderColor('borderBottomColor'),
    borderLeftColor: borderColor('borderLeftColor'),
    paddingTop: get('paddingTop', style.paddingTop, pxOrPercent),
    paddingRight: get('paddingRight', style.paddingRight, pxOrPercent),
    paddingBottom: get('paddingBottom', style.paddingBottom, pxOrPercent),
    paddingLeft: get('paddingLeft', style.paddingLeft, pxOrPercent),
    marginTop: get('marginTop', style.marginTop, pxOrPercentOrAuto),
    marginRight: get('marginRight', style.marginRight, pxOrPercentOrAuto),
    marginBottom: get('marginBottom', style.marginBottom, pxOrPercentOrAuto),
    marginLeft: get('marginLeft', style.marginLeft, pxOrPercentOrAuto),
    tabSize: get('tabSize', style.tabSize, v => {
      if (typeof v === 'number') return v;
      if (v.unit === null) return v;
      return px(v);
    }),
    position: get('position', style.position, keep),
    width: get('width', style.width, pxOrPercentOrAuto),
    height: get('height', style.height, pxOrPercentOrAuto),
    top: get('top', style.top, pxOrPercentOrAuto),
    right: get('right', style.right, pxOrPercentOrAuto),
    bottom: get('bottom', style.bottom, pxOrPercentOrAuto),
    left: get('left', style.left, pxOrPercentOrAuto),
    boxSizing: get('boxSizing', style.boxSizing, keep),
    textAlign: get('textAlign', style.textAlign, keep),
    textDecorationLine,
    visibility: get('visibility', style.visibility, keep),
    listStyleType: get('listStyleType', style.listStyleType, keep),
    zIndex: get('zIndex', style.zIndex, keep)
  }, extra);
}

function inheritExtra(parentStyle: Style, own: ReadonlyMap<string, string>) {
  if (own.size === 0 && parentStyle.extra.size === 0) return own;
  const ret = new Map<string, string>();
  for (const [name, value] of parentStyle.extra) {
    if (name.startsWith('--')) ret.set(name, value);
  }
  for (const [name, value] of own) ret.set(name, value);
  return ret;
}

/**
 * Very simple property inheritance model. createStyle starts out with cascaded
 * styles (CSS Cascading and Inheritance Level 4 §4.2), does inheritance and
 * defaulting to get the specified style (§4.3) and then calculates the
 * computed style (§4.4) by resolving em, viewport units, some percentages, etc.
 * Used styles (§4.5) are calculated during layout, external to this file.
 */
export function createStyle(
  parentStyle: Style,
  cascaded: CascadedStyle,
  ctx: ComputeContext,
  extra: ReadonlyMap<string, string> = new Map()
) {
  return computeStyle(parentStyle, cascaded, inheritExtra(parentStyle, extra), ctx);
}

// required styles that always come last in the cascade
const rootDeclaredStyle: DeclaredStyle = {
  display: {outer: 'block', inner: 'flow-root', listItem: false}
};

export function createRootStyle(
  cascaded: CascadedStyle,
  ctx: ComputeContext,
  extra?: ReadonlyMap<string, string>
) {
  const display = cascaded.display;
  const hidden = typeof display === 'object' && display.outer === 'none';
  const style = hidden ? cascaded : cascadeStyles(cascaded, rootDeclaredStyle);
  return createStyle(initialStyle, style, ctx, extra);
}

/**
 * Text nodes and anonymous boxes take only inherited values from their parent
 */
export function createAnonymousStyle(parentStyle: Style, ctx: ComputeContext) {
  return createStyle(parentStyle, EMPTY_STYLE, ctx);
}
