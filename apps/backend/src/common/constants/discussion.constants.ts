export const DEFAULT_INTERNAL_ERROR_MESSAGE =
  'We are facing a problem with the subsystem';
export const MISSING_CATEGORY_ERROR_MESSAGE =
  'The category is not existing, please verify the information';
export const MISSING_TOPIC_ERROR_MESSAGE =
  'The topic is not existing, please verify the information';
export const MISSING_POST_ERROR_MESSAGE =
  'The post is not existing, please verify the information';
export const MISSING_RESOURCE_ERROR_MESSAGE =
  'The requested resource is not existing, please verify the information';
export const AUTHENTICATION_NEEDED_MESSAGE =
  'You need to be logged in in order to publish on forum';
export const TOPIC_DELETION_FORBIDDEN_MESSAGE =
  'Only the topic owner or admin can delete the topic.';
export const MODERATION_SEND_FAILED_MESSAGE =
  'Failed to send the content to moderation';
export const ASSET_RETRIEVAL_FAILED_MESSAGE =
  'Could not retrieve the asset information';
export const NOTIFICATION_SEND_FAILED_MESSAGE =
  'Failed to send the notification';

export const MIN_TITLE_LENGTH = 15;
export const MIN_CONTENT_LENGTH = 20;
export const TITLE_TOO_SHORT = `You need to provide a title at least ${MIN_TITLE_LENGTH} chars`;
export const CONTENT_TOO_SHORT = `You need to provide a text at least ${MIN_CONTENT_LENGTH} chars`;

export const CONTENT_BLOCKED = '[Content has been blocked]';

export const AUTH_ERROR_CODE = 25001;
export const ASSET_ERROR_CODE = 25002;

// Topics opened against this asset are general posts, not tied to an asset
export const GENERAL_POST_ASSET_ID = '00000000-0000-0000-0000-111111111111';

export const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
