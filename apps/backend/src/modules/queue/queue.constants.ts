export const MODERATION_QUEUE = 'moderation';
export const NOTIFICATION_QUEUE = 'notification';

export type OutboundQueue = typeof MODERATION_QUEUE | typeof NOTIFICATION_QUEUE;
