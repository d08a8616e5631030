import { HttpStatus } from '@nestjs/common';
import {
  ASSET_RETRIEVAL_FAILED_MESSAGE,
  AUTHENTICATION_NEEDED_MESSAGE,
  DEFAULT_INTERNAL_ERROR_MESSAGE,
  MISSING_RESOURCE_ERROR_MESSAGE,
  MODERATION_SEND_FAILED_MESSAGE,
  NOTIFICATION_SEND_FAILED_MESSAGE,
  TOPIC_DELETION_FORBIDDEN_MESSAGE,
} from '../constants/discussion.constants';

/**
 * Base class of every failure the discussion API knows how to render.
 *
 * `message` is what gets logged, `publicMessage` is what the client sees.
 */
export class DiscussionError extends Error {
  constructor(
    message: string,
    readonly status: HttpStatus,
    readonly publicMessage: string = message,
    readonly code?: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** The forum answered with a 5xx or an unreadable payload. */
export class DiscourseUnavailableError extends DiscussionError {
  constructor(message: string) {
    super(
      message,
      HttpStatus.INTERNAL_SERVER_ERROR,
      DEFAULT_INTERNAL_ERROR_MESSAGE,
    );
  }
}

/** The forum refused our API key. */
export class DiscourseAuthenticationError extends DiscussionError {
  constructor(message: string) {
    super(
      message,
      HttpStatus.INTERNAL_SERVER_ERROR,
      DEFAULT_INTERNAL_ERROR_MESSAGE,
    );
  }
}

export class DiscourseResourceUnavailableError extends DiscussionError {
  constructor(
    message: string,
    publicMessage: string = MISSING_RESOURCE_ERROR_MESSAGE,
  ) {
    super(message, HttpStatus.NOT_FOUND, publicMessage);
  }
}

/** Validation or rate limiting on the forum side, detail is kept. */
export class DiscourseRequestError extends DiscussionError {
  constructor(message: string) {
    super(message, HttpStatus.BAD_REQUEST);
  }
}

export class AuthenticationNeededError extends DiscussionError {
  constructor(message: string = AUTHENTICATION_NEEDED_MESSAGE) {
    super(message, HttpStatus.UNAUTHORIZED);
  }
}

export class InsufficientRoleError extends DiscussionError {
  constructor(message: string) {
    super(message, HttpStatus.FORBIDDEN);
  }
}

export class TopicDeletionForbiddenError extends DiscussionError {
  constructor(message: string = TOPIC_DELETION_FORBIDDEN_MESSAGE) {
    super(message, HttpStatus.FORBIDDEN);
  }
}

export class SendModerationError extends DiscussionError {
  constructor(message: string) {
    super(
      message,
      HttpStatus.INTERNAL_SERVER_ERROR,
      MODERATION_SEND_FAILED_MESSAGE,
    );
  }
}

export class NotificationSendError extends DiscussionError {
  constructor(message: string) {
    super(
      message,
      HttpStatus.INTERNAL_SERVER_ERROR,
      NOTIFICATION_SEND_FAILED_MESSAGE,
    );
  }
}

export class AssetRetrievalError extends DiscussionError {
  constructor(message: string) {
    super(
      message,
      HttpStatus.INTERNAL_SERVER_ERROR,
      ASSET_RETRIEVAL_FAILED_MESSAGE,
    );
  }
}

/** Unexpected failure while talking to the auth or asset service. */
export class CollaboratorError extends DiscussionError {
  constructor(message: string, code: number) {
    super(
      message,
      HttpStatus.INTERNAL_SERVER_ERROR,
      DEFAULT_INTERNAL_ERROR_MESSAGE,
      code,
    );
  }
}

export class RequestValidationError extends DiscussionError {
  constructor(message: string) {
    super(message, HttpStatus.BAD_REQUEST);
  }
}
