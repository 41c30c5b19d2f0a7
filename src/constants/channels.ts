/**
 * Channel names
 * The channels table accepts only these values (CHECK constraint in 001_initial_schema.sql)
 */
export const CHANNEL_NAMES = {
  EMAIL: 'email',
  PHONE: 'phone',
  POST: 'post',
} as const;

export type ChannelName = (typeof CHANNEL_NAMES)[keyof typeof CHANNEL_NAMES];

export const CHANNEL_NAME_VALUES = [CHANNEL_NAMES.EMAIL, CHANNEL_NAMES.PHONE, CHANNEL_NAMES.POST] as const;
