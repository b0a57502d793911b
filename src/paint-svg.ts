import {fontToCss} from './text-measure.js';

import type {BorderStyle, Color} from './style.js';
import type {FontDescriptor} from './text-measure.js';
import type {Renderer} from './display-list.js';

function encode(s: string) {
  return s.replaceAll('&', '&amp;').replaceAll('<', '&lt;').replaceAll('"', '&quot;');
}

function camelToKebab(camel: string) {
  return camel.replace(/[A-Z]/g, s => '-' + s.toLowerCase());
}

function rgba({r, g, b, a}: Color) {
  return `rgba(${r}, ${g}, ${b}, ${a})`;
}

function dashArray(style: BorderStyle, width: number) {
  if (style === 'dotted') return ` stroke-dasharray="${width} ${width}"`;
  if (style === 'dashed') return ` stroke-dasharray="${width * 3} ${width * 3}"`;
  return '';
}

/**
 * Collects the painted document as SVG markup. Every replay clears what was
 * there before.
 */
export class SvgRenderer implements Renderer {
  main: string;
  width: number;
  height: number;

  constructor() {
    this.main = '';
    this.width = 0;
    this.height = 0;
  }

  style(style: Record<string, string>) {
    return Object.entries(style).map(([prop, value]) => {
      return `${camelToKebab(prop)}: ${value}`;
    }).join('; ');
  }

  clear(width: number, height: number) {
    this.main = '';
    this.width = width;
    this.height = height;
  }

  fillRect(x: number, y: number, w: number, h: number, color: Color) {
    this.main += `<rect x="${x}" y="${y}" width="${w}" height="${h}" fill="${rgba(color)}" />`;
  }

  strokeBorder(
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    width: number,
    style: BorderStyle,
    color: Color
  ) {
    const dash = dashArray(style, width);
    this.main += `<line x1="${x1}" y1="${y1}" x2="${x2}" y2="${y2}" stroke="${rgba(color)}" stroke-width="${width}"${dash} />`;
  }

  drawText(x: number, y: number, text: string, font: FontDescriptor, color: Color) {
    const style = this.style({font: fontToCss(font), whiteSpace: 'pre'});
    this.main += `<text x="${x}" y="${y}" style="${encode(style)}" fill="${rgba(color)}">${encode(text)}</text>`;
  }

  image(x: number, y: number, w: number, h: number, src: string) {
    this.main += `<image x="${x}" y="${y}" width="${w}" height="${h}" href="${encode(src)}" />`;
  }

  toString() {
    const {width, height} = this;
    return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">${this.main}</svg>`;
  }
}
