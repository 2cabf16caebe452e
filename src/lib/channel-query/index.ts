export {
  CHANNEL_FIELDS,
  compareChannels,
  filterChannels,
  findChannel,
  searchChannels,
  summarizeChannels,
  type ChannelField,
  type ChannelFilter,
  type ChannelSummary,
  type FieldDifference,
} from './channel-query';
