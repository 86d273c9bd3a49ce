export interface AllowList {
  users: string[];
  channels: string[];
}

export const hasMatch = (value: string, exact: string[]) => {
  if (!exact.length) return true;
  return exact.includes(value);
};

/**
 * Empty lists allow everyone. Direct messages skip the channel list; the user
 * list still applies.
 */
export const isAllowed = (allow: AllowList, input: { userId: string; channelId: string; isDirectMessage: boolean }) => {
  if (!input.isDirectMessage && !hasMatch(input.channelId, allow.channels)) {
    return false;
  }
  return hasMatch(input.userId, allow.users);
};
