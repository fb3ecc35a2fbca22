/**
 * RgbColor
 *
 * Rich color value with 16-bit channels. Preferences are seeded from it
 * and hand a fresh instance back from getColor().
 *
 * @module color/RgbColor
 */

import { z } from 'zod';
import type { ColorChannels, ColorSource } from '../types/color.types';
import { channelsToHex, createChannels } from './channels';

/** #rgb, #rrggbb or #rrrrggggbbbb */
export const hexColorSchema = z
  .string()
  .regex(/^#([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{12})$/i, 'Invalid hex color');

export class RgbColor implements ColorSource {
  private readonly channels: ColorChannels;

  constructor(red: number, green: number, blue: number) {
    this.channels = createChannels(red, green, blue);
  }

  /**
   * Parse a CSS-style or 16-bit hex color.
   * 4- and 8-bit digits are widened so that `ff` becomes `ffff`.
   *
   * @throws ZodError when the string is not a hex color
   *
   * @example
   * RgbColor.fromHex('#ff8000').toHex(); // '#ffff80800000'
   */
  static fromHex(hex: string): RgbColor {
    const digits = hexColorSchema.parse(hex).slice(1);
    const width = digits.length / 3;
    const [red, green, blue] = [0, 1, 2].map((i) =>
      widen(parseInt(digits.slice(i * width, (i + 1) * width), 16), width)
    );
    return new RgbColor(red, green, blue);
  }

  static fromChannels(channels: ColorChannels): RgbColor {
    return new RgbColor(channels.red, channels.green, channels.blue);
  }

  getRed(): number {
    return this.channels.red;
  }

  getGreen(): number {
    return this.channels.green;
  }

  getBlue(): number {
    return this.channels.blue;
  }

  toChannels(): ColorChannels {
    return this.channels;
  }

  toHex(): string {
    return channelsToHex(this.channels);
  }

  equals(other: ColorSource): boolean {
    return (
      this.getRed() === other.getRed() &&
      this.getGreen() === other.getGreen() &&
      this.getBlue() === other.getBlue()
    );
  }
}

// 1 hex digit ×0x1111, 2 digits ×0x101, 4 digits as-is
function widen(value: number, digits: number): number {
  if (digits === 1) return value * 0x1111;
  if (digits === 2) return value * 0x101;
  return value;
}
