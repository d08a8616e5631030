export enum ModerationEventStatus {
  AUTO_PENDING = 'auto_pending',
}

export enum FunctionalArea {
  DISCUSSION_POST = 'discussion_post',
  DISCUSSION_TOPIC = 'discussion_topic',
}

export enum AutoModerationType {
  TEXT_TOXICITY = 'text_toxicity',
}

export enum ContentType {
  TEXT = 'text',
}

export interface ModerationContentItem {
  name: 'post_content' | 'topic_title';
  value: string;
}

export interface ModerationContent {
  data_by_type: Partial<Record<ContentType, ModerationContentItem[]>>;
}

/** HTTP call the moderation subsystem makes back into this service. */
export interface ModerationCallback {
  service: string;
  method: 'PUT' | 'DELETE';
  url: string;
  headers: Record<string, string>;
  payload: {
    text: string;
    author_id: string;
  };
}

export interface ModerationEvent {
  status: ModerationEventStatus;
  content_id: string;
  user_id: string;
  date: string;
  url: string;
  functional_area: FunctionalArea;
  content: ModerationContent;
  auto_mod_routing: { moderation_type: AutoModerationType }[];
  reject_callbacks: ModerationCallback[];
  accept_callbacks: ModerationCallback[];
  history: unknown[];
  transaction_id: string;
}
