export { RgbColor, hexColorSchema } from './RgbColor';
export {
  CHANNEL_MAX,
  colorChannelsSchema,
  toChannel,
  createChannels,
  channelsFromSource,
  channelsToHex,
} from './channels';
