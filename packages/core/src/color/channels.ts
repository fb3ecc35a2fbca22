/**
 * Color channel helpers
 *
 * @module color/channels
 */

import { z } from 'zod';
import type { ColorChannels, ColorSource } from '../types/color.types';

export const CHANNEL_MAX = 0xffff;

const channelSchema = z.number().int().min(0).max(CHANNEL_MAX);

/**
 * Validates a plain object as ColorChannels
 */
export const colorChannelsSchema: z.ZodType<ColorChannels> = z.object({
  red: channelSchema,
  green: channelSchema,
  blue: channelSchema,
});

/**
 * Store a number the way an unsigned 16-bit field would:
 * fraction dropped, wrapped modulo 65536.
 */
export function toChannel(value: number): number {
  return value & CHANNEL_MAX;
}

export function createChannels(red: number, green: number, blue: number): ColorChannels {
  return Object.freeze({
    red: toChannel(red),
    green: toChannel(green),
    blue: toChannel(blue),
  });
}

/**
 * Extract the three channels from a rich color.
 * The source object is not retained.
 */
export function channelsFromSource(source: ColorSource): ColorChannels {
  return createChannels(source.getRed(), source.getGreen(), source.getBlue());
}

function hex4(channel: number): string {
  return channel.toString(16).padStart(4, '0');
}

/**
 * `#rrrrggggbbbb`, four hex digits per channel
 */
export function channelsToHex(channels: ColorChannels): string {
  return `#${hex4(channels.red)}${hex4(channels.green)}${hex4(channels.blue)}`;
}
