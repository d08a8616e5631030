import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AssetCategoryService } from '@modules/asset-category/asset-category.service';
import { AuthenticatedUser } from '@modules/auth/interfaces/authenticated-user.interface';
import {
  AuthenticationNeededError,
  DiscourseRequestError,
  DiscourseResourceUnavailableError,
} from '@common/exceptions/discussion.exceptions';
import {
  MISSING_CATEGORY_ERROR_MESSAGE,
  MISSING_POST_ERROR_MESSAGE,
  MISSING_TOPIC_ERROR_MESSAGE,
} from '@common/constants/discussion.constants';
import { DiscourseConfig } from '@config/discourse.config';
import { DiscourseApiClient } from './discourse-api.client';
import {
  CategoryEnvelopeSchema,
  DiscourseCategory,
  DiscoursePost,
  DiscoursePostSchema,
  DiscourseTopic,
  DiscourseTopicRecord,
  PostEnvelopeSchema,
  TopicDetailSchema,
  TopicWithPostsSchema,
  extractErrors,
  TopicListSchema,
} from './discourse.schemas';

// Description the forum uses for the poster who opened a topic
const ORIGINAL_POSTER = 'Original Poster';

// Every category gets an "About the <name> category" topic on creation
const PLACEHOLDER_TOPIC_PATTERN = /^About the \d+(?:_[a-fA-F0-9-]+)? category/;

export function isPlaceholderTopic(title: string): boolean {
  return PLACEHOLDER_TOPIC_PATTERN.test(title);
}

export interface TopicWithPosts {
  topic: DiscourseTopic;
  posts: DiscoursePost[];
}

@Injectable()
export class DiscourseService {
  private readonly logger = new Logger(DiscourseService.name);
  private readonly discourse: DiscourseConfig;

  constructor(
    private readonly client: DiscourseApiClient,
    private readonly assetCategoryService: AssetCategoryService,
    configService: ConfigService,
  ) {
    this.discourse = configService.getOrThrow<DiscourseConfig>('discourse');
  }

  /**
   * Makes sure the caller has a forum account. The forum answers 200 for an
   * existing account as well, so any non-error status is accepted.
   */
  async ensureUser(
    user: AuthenticatedUser | undefined,
  ): Promise<AuthenticatedUser> {
    if (!user) {
      this.logger.warn('Anonymous caller tried to publish');
      throw new AuthenticationNeededError();
    }

    this.logger.log(`Checking forum account of user ${user.id}`);
    await this.client.call('post', '/users.json', 'user provisioning', {
      data: {
        name: user.displayName,
        email: `${user.id}@${this.discourse.userEmailDomain}`,
        password: this.discourse.userPassword,
        username: user.username,
        active: true,
        approved: true,
      },
    });
    return user;
  }

  async getCategory(
    categoryId: number | null,
    assetId: string,
  ): Promise<DiscourseCategory> {
    this.logger.log(`Getting category ${categoryId} of asset ${assetId}`);
    if (categoryId === null) {
      return this.createCategory(assetId);
    }

    try {
      const payload = await this.client.call(
        'get',
        `/c/${categoryId}/show.json`,
        'category retrieval',
      );
      return this.client.decode(
        CategoryEnvelopeSchema,
        payload,
        'category retrieval',
      ).category;
    } catch (error) {
      if (error instanceof DiscourseResourceUnavailableError) {
        this.logger.warn(
          `Category ${categoryId} vanished, creating a new one for asset ${assetId}`,
        );
        return this.createCategory(assetId);
      }
      throw error;
    }
  }

  async createCategory(assetId: string): Promise<DiscourseCategory> {
    this.logger.log(`Creating category for asset ${assetId}`);
    const suffix = Math.floor(Math.random() * 1e6);
    const payload = await this.client.call(
      'post',
      '/categories.json',
      'category creation',
      { data: { name: `${suffix}_${assetId}` } },
    );
    this.rejectEmbeddedErrors(payload);

    const { category } = this.client.decode(
      CategoryEnvelopeSchema,
      payload,
      'category creation',
    );
    const stored = await this.assetCategoryService.store(
      assetId,
      category.id,
      `${this.client.host}/c/${category.slug}/${category.id}`,
    );
    if (!stored) {
      this.logger.warn(
        `Asset ${assetId} already had a category, category ${category.id} is orphaned`,
      );
    }
    return category;
  }

  async getTopics(slug: string, categoryId: number): Promise<DiscourseTopic[]> {
    this.logger.log(`Getting topics for slug ${slug} category ${categoryId}`);
    const payload = await this.client.call(
      'get',
      `/c/${slug}/${categoryId}.json`,
      'topic listing',
      { notFoundMessage: MISSING_CATEGORY_ERROR_MESSAGE },
    );
    const data = this.client.decode(TopicListSchema, payload, 'topic listing');

    const usernames = new Map<number, string>(
      data.users.map((user) => [user.id, user.username]),
    );

    return data.topic_list.topics
      .filter((topic) => !isPlaceholderTopic(topic.title))
      .map((topic) => {
        const originalPoster = topic.posters.find((poster) =>
          poster.description.includes(ORIGINAL_POSTER),
        );
        const username = originalPoster
          ? (usernames.get(originalPoster.user_id) ?? null)
          : null;
        return { ...topic, username };
      });
  }

  /** Opens a topic and returns its first post. */
  async createTopic(
    username: string,
    categoryId: number,
    title: string,
    content: string,
  ): Promise<DiscoursePost> {
    this.logger.log(
      `Creating topic on category ${categoryId} for ${username}`,
    );
    const payload = await this.client.call(
      'post',
      '/posts.json',
      'topic creation',
      {
        username,
        data: { category: categoryId, title, raw: content },
      },
    );
    this.rejectEmbeddedErrors(payload);
    return this.client.decode(DiscoursePostSchema, payload, 'topic creation');
  }

  async createPost(
    username: string,
    topicId: number,
    text: string,
  ): Promise<DiscoursePost> {
    this.logger.log(`Creating post in topic ${topicId} for ${username}`);
    const payload = await this.client.call(
      'post',
      '/posts.json',
      'post creation',
      {
        username,
        data: { topic_id: topicId, raw: text },
        notFoundMessage: MISSING_TOPIC_ERROR_MESSAGE,
      },
    );
    this.rejectEmbeddedErrors(payload);
    return this.client.decode(DiscoursePostSchema, payload, 'post creation');
  }

  async getTopic(topicId: number): Promise<DiscourseTopic> {
    const payload = await this.client.call(
      'get',
      `/t/${topicId}.json`,
      'topic retrieval',
      { notFoundMessage: MISSING_TOPIC_ERROR_MESSAGE },
    );
    const { details, ...topic } = this.client.decode(
      TopicDetailSchema,
      payload,
      'topic retrieval',
    );
    return withCreator(topic, details?.created_by?.username);
  }

  async getTopicWithPosts(topicId: number): Promise<TopicWithPosts> {
    const payload = await this.client.call(
      'get',
      `/t/${topicId}.json`,
      'post listing',
      {
        params: { print: true },
        notFoundMessage: MISSING_TOPIC_ERROR_MESSAGE,
      },
    );
    const { details, post_stream, ...topic } = this.client.decode(
      TopicWithPostsSchema,
      payload,
      'post listing',
    );
    return {
      topic: withCreator(topic, details?.created_by?.username),
      posts: post_stream.posts,
    };
  }

  async getPost(postId: number): Promise<DiscoursePost> {
    const payload = await this.client.call(
      'get',
      `/posts/${postId}.json`,
      'post retrieval',
      { notFoundMessage: MISSING_POST_ERROR_MESSAGE },
    );
    return this.client.decode(DiscoursePostSchema, payload, 'post retrieval');
  }

  async editPost(postId: number, text: string): Promise<DiscoursePost> {
    this.logger.log(`Editing post ${postId}`);
    const payload = await this.client.call(
      'put',
      `/posts/${postId}.json`,
      'post modification',
      {
        data: { raw: text },
        notFoundMessage: MISSING_POST_ERROR_MESSAGE,
      },
    );
    return this.client.decode(PostEnvelopeSchema, payload, 'post modification')
      .post;
  }

  async deleteTopic(topicId: number): Promise<void> {
    this.logger.log(`Deleting topic ${topicId}`);
    await this.client.call('delete', `/t/${topicId}.json`, 'topic deletion', {
      notFoundMessage: MISSING_TOPIC_ERROR_MESSAGE,
    });
    this.logger.log(`Topic ${topicId} deleted`);
  }

  private rejectEmbeddedErrors(payload: unknown): void {
    const errors = extractErrors(payload);
    if (errors) {
      this.logger.error(`Forum reported errors: ${errors.join('-')}`);
      throw new DiscourseRequestError(errors.join('-'));
    }
  }
}

function withCreator(
  topic: DiscourseTopicRecord,
  username: string | null | undefined,
): DiscourseTopic {
  return { ...topic, username: username ?? null };
}
