import {Diagnostics} from './diagnostics.js';
import {defaultEnvironment} from './environment.js';

import type {Environment} from './environment.js';

export interface FontDescriptor {
  families: readonly string[];
  size: number;
  weight: number;
  style: 'normal' | 'italic' | 'oblique';
}

export interface LineMetrics {
  ascent: number;
  descent: number;
  recommendedLineHeight: number;
}

/**
 * Answers font questions for layout. Any answer can be undefined when the
 * provider doesn't know the font; layout then falls back to the metrics in
 * the Environment and reports a MissingGlyphMetric diagnostic.
 */
export interface MeasurementProvider {
  /**
   * Advance width of one space in the font
   */
  spaceAdvance(font: FontDescriptor): number | undefined;
  /**
   * Sum of the glyph advances of `text`, including kerning
   */
  wordAdvance(font: FontDescriptor, text: string): number | undefined;
  lineMetrics(font: FontDescriptor): LineMetrics | undefined;
}

/**
 * CSS `font` shorthand for the descriptor, e.g. "italic 700 24px Arial, serif"
 */
export function fontToCss(font: FontDescriptor) {
  const families = font.families.map(f => /\s/.test(f) ? `"${f}"` : f).join(', ');
  const style = font.style === 'normal' ? '' : `${font.style} `;
  return `${style}${font.weight} ${font.size}px ${families}`;
}

export interface FixedMetricsOptions {
  /** ems per character */
  advance?: number;
  /** ems per space */
  space?: number;
  ascent?: number;
  descent?: number;
  lineHeight?: number;
  /**
   * Adjustments in ems keyed by character pair, e.g. {AV: -0.1}
   */
  kerning?: Record<string, number>;
  /**
   * Font families the provider knows. When set, fonts naming none of these
   * get no metrics.
   */
  families?: string[];
}

/**
 * Monospaced metrics proportional to the font size. Useful for tests and for
 * hosts that only need approximate geometry.
 */
export class FixedMetricsProvider implements MeasurementProvider {
  advance: number;
  space: number;
  ascent: number;
  descent: number;
  lineHeight: number;
  kerning: Map<string, number>;
  families: Set<string> | undefined;

  constructor(options: FixedMetricsOptions = {}) {
    this.advance = options.advance ?? 0.5;
    this.space = options.space ?? 0.25;
    this.ascent = options.ascent ?? 0.75;
    this.descent = options.descent ?? 0.25;
    this.lineHeight = options.lineHeight ?? 1.25;
    this.kerning = new Map(Object.entries(options.kerning ?? {}));
    this.families = options.families && new Set(options.families.map(f => f.toLowerCase()));
  }

  knows(font: FontDescriptor) {
    const families = this.families;
    if (!families) return true;
    return font.families.some(f => families.has(f.toLowerCase()));
  }

  spaceAdvance(font: FontDescriptor) {
    if (!this.knows(font)) return;
    return this.space * font.size;
  }

  wordAdvance(font: FontDescriptor, text: string) {
    if (!this.knows(font)) return;
    const chars = Array.from(text);
    let ems = chars.length * this.advance;
    for (let i = 1; i < chars.length; i++) {
      ems += this.kerning.get(chars[i - 1] + chars[i]) ?? 0;
    }
    return ems * font.size;
  }

  lineMetrics(font: FontDescriptor) {
    if (!this.knows(font)) return;
    return {
      ascent: this.ascent * font.size,
      descent: this.descent * font.size,
      recommendedLineHeight: this.lineHeight * font.size
    };
  }
}

/**
 * Wraps a MeasurementProvider for one layout: caches answers per font and
 * substitutes fallback metrics for missing ones
 */
export class Measurer {
  private provider: MeasurementProvider;
  private environment: Readonly<Environment>;
  private diagnostics: Diagnostics;
  private words: Map<string, number>;
  private spaces: Map<string, number>;
  private metrics: Map<string, LineMetrics>;

  constructor(
    provider: MeasurementProvider,
    diagnostics: Diagnostics = new Diagnostics(),
    environment: Readonly<Environment> = defaultEnvironment
  ) {
    this.provider = provider;
    this.environment = environment;
    this.diagnostics = diagnostics;
    this.words = new Map();
    this.spaces = new Map();
    this.metrics = new Map();
  }

  wordAdvance(font: FontDescriptor, text: string) {
    const key = fontToCss(font) + '\0' + text;
    let advance = this.words.get(key);
    if (advance === undefined) {
      advance = this.provider.wordAdvance(font, text);
      if (advance === undefined) {
        advance = Array.from(text).length * this.environment.fallbackAdvance * font.size;
        this.diagnostics.report(
          'MissingGlyphMetric',
          `no advance for "${text}" in ${fontToCss(font)}`
        );
      }
      this.words.set(key, advance);
    }
    return advance;
  }

  spaceAdvance(font: FontDescriptor) {
    const key = fontToCss(font);
    let advance = this.spaces.get(key);
    if (advance === undefined) {
      advance = this.provider.spaceAdvance(font);
      if (advance === undefined) {
        advance = this.environment.fallbackSpaceAdvance * font.size;
        this.diagnostics.report('MissingGlyphMetric', `no space advance in ${key}`);
      }
      this.spaces.set(key, advance);
    }
    return advance;
  }

  lineMetrics(font: FontDescriptor) {
    const key = fontToCss(font);
    let metrics = this.metrics.get(key);
    if (metrics === undefined) {
      metrics = this.provider.lineMetrics(font);
      if (metrics === undefined) {
        metrics = {
          ascent: this.environment.fallbackAscent * font.size,
          descent: this.environment.fallbackDescent * font.size,
          recommendedLineHeight: this.environment.fallbackLineHeight * font.size
        };
        this.diagnostics.report('MissingGlyphMetric', `no line metrics for ${key}`);
      }
      this.metrics.set(key, metrics);
    }
    return metrics;
  }
}
