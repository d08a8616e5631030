import { Test, TestingModule } from '@nestjs/testing';
import { HttpService } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';
import { AssetCategoryService } from '@modules/asset-category/asset-category.service';
import {
  AuthenticationNeededError,
  DiscourseAuthenticationError,
  DiscourseRequestError,
  DiscourseResourceUnavailableError,
  DiscourseUnavailableError,
} from '@common/exceptions/discussion.exceptions';
import {
  DEFAULT_INTERNAL_ERROR_MESSAGE,
  MISSING_CATEGORY_ERROR_MESSAGE,
} from '@common/constants/discussion.constants';
import { Role } from '@modules/access/enums/role.enum';
import discourseConfig from '@config/discourse.config';
import { DiscourseApiClient } from './discourse-api.client';
import { DiscourseService, isPlaceholderTopic } from './discourse.service';
import { FakeHttpService } from '../../../test/utils/fake-http.service';
import categoryFixture from '../../../test/fixtures/category.json';
import topicListFixture from '../../../test/fixtures/topic-list.json';
import topicWithPostsFixture from '../../../test/fixtures/topic-with-posts.json';
import postFixture from '../../../test/fixtures/post.json';

const FORUM = 'https://forum.test';
const ASSET_ID = '7d0f3a52-5b7e-4c55-9a39-2f0f3e8d1a10';

describe('DiscourseService', () => {
  let service: DiscourseService;
  let http: FakeHttpService;

  const mockAssetCategoryService = {
    lookup: jest.fn(),
    store: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    mockAssetCategoryService.store.mockResolvedValue(true);
    http = new FakeHttpService();

    const module: TestingModule = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [discourseConfig],
        }),
      ],
      providers: [
        DiscourseApiClient,
        DiscourseService,
        { provide: HttpService, useValue: http },
        { provide: AssetCategoryService, useValue: mockAssetCategoryService },
      ],
    }).compile();

    service = module.get<DiscourseService>(DiscourseService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('ensureUser', () => {
    it('refuses anonymous callers without calling the forum', async () => {
      await expect(service.ensureUser(undefined)).rejects.toBeInstanceOf(
        AuthenticationNeededError,
      );
      expect(http.calls).toHaveLength(0);
    });

    it('provisions the forum account with placeholder credentials', async () => {
      http.on('POST', `${FORUM}/users.json`, 200, {
        success: false,
        message: 'Username already taken',
      });
      const user = {
        id: 'u-42',
        username: 'jdoe',
        displayName: 'Jane Doe',
        roles: [Role.USER],
      };

      await expect(service.ensureUser(user)).resolves.toBe(user);

      expect(http.calls).toHaveLength(1);
      expect(http.calls[0].data).toEqual({
        name: 'Jane Doe',
        email: 'u-42@users.test',
        password: 'test-password',
        username: 'jdoe',
        active: true,
        approved: true,
      });
      expect(http.calls[0].headers).toEqual({
        'Api-Key': 'test-api-key',
        'Api-Username': 'system',
        Accept: 'application/json',
      });
    });
  });

  describe('getCategory', () => {
    it('creates a category when the asset has none', async () => {
      jest.spyOn(Math, 'random').mockReturnValue(0.4242421);
      http.on('POST', `${FORUM}/categories.json`, 200, categoryFixture);

      const category = await service.getCategory(null, ASSET_ID);

      expect(category.id).toBe(1);
      expect(category.name).toBe('Uncategorized');
      expect(http.calls[0].data).toEqual({ name: `424242_${ASSET_ID}` });
      expect(mockAssetCategoryService.store).toHaveBeenCalledTimes(1);
      expect(mockAssetCategoryService.store).toHaveBeenCalledWith(
        ASSET_ID,
        1,
        'https://forum.test/c/uncategorized/1',
      );
    });

    it('returns the existing category', async () => {
      http.on('GET', `${FORUM}/c/1/show.json`, 200, categoryFixture);

      const category = await service.getCategory(1, ASSET_ID);

      expect(category.slug).toBe('uncategorized');
      expect(mockAssetCategoryService.store).not.toHaveBeenCalled();
    });

    it('falls back to creation when the forum lost the category', async () => {
      http
        .on('GET', `${FORUM}/c/9/show.json`, 404, { errors: ['not found'] })
        .on('POST', `${FORUM}/categories.json`, 201, categoryFixture);

      const category = await service.getCategory(9, ASSET_ID);

      expect(category.id).toBe(1);
      expect(http.calls.map((call) => call.path)).toEqual([
        '/c/9/show.json',
        '/categories.json',
      ]);
    });

    it('still returns the category when the association already existed', async () => {
      mockAssetCategoryService.store.mockResolvedValue(false);
      http.on('POST', `${FORUM}/categories.json`, 200, categoryFixture);

      await expect(service.getCategory(null, ASSET_ID)).resolves.toMatchObject(
        { id: 1 },
      );
    });
  });

  describe('createCategory', () => {
    it('raises the errors embedded in the payload', async () => {
      http.on('POST', `${FORUM}/categories.json`, 200, {
        errors: ['Category Name has already been taken'],
      });

      await expect(service.createCategory(ASSET_ID)).rejects.toThrow(
        new DiscourseRequestError('Category Name has already been taken'),
      );
      expect(mockAssetCategoryService.store).not.toHaveBeenCalled();
    });
  });

  describe('getTopics', () => {
    it('drops placeholder topics and resolves the original poster', async () => {
      http.on('GET', `${FORUM}/c/uncategorized/1.json`, 200, topicListFixture);

      const topics = await service.getTopics('uncategorized', 1);

      expect(topics).toHaveLength(1);
      expect(topics[0].id).toBe(67);
      expect(topics[0].username).toBe('test1');
    });

    it('leaves the username null without an original poster', async () => {
      http.on('GET', `${FORUM}/c/uncategorized/1.json`, 200, {
        users: [{ id: 11, username: 'reviewer' }],
        topic_list: {
          topics: [
            {
              id: 68,
              title: 'Question about the grid resolution',
              fancy_title: 'Question about the grid resolution',
              slug: 'question-about-the-grid-resolution',
              posts_count: 1,
              created_at: '2024-03-04T12:00:00.000Z',
              category_id: 1,
              posters: [{ description: 'Most Recent Poster', user_id: 11 }],
            },
          ],
        },
      });

      const topics = await service.getTopics('uncategorized', 1);

      expect(topics[0].username).toBeNull();
    });

    it('reports a missing category with its own message', async () => {
      http.on('GET', `${FORUM}/c/gone/3.json`, 404);

      const pending = service.getTopics('gone', 3);

      await expect(pending).rejects.toBeInstanceOf(
        DiscourseResourceUnavailableError,
      );
      await expect(pending).rejects.toHaveProperty(
        'publicMessage',
        MISSING_CATEGORY_ERROR_MESSAGE,
      );
    });
  });

  describe('createTopic', () => {
    it('publishes as the acting user and returns the first post', async () => {
      http.on('POST', `${FORUM}/posts.json`, 200, postFixture);

      const post = await service.createTopic(
        'test1',
        1,
        'Calibration of the sea level dataset',
        'Which reference frame was used for the calibration?',
      );

      expect(post.id).toBe(302);
      expect(http.calls[0].data).toEqual({
        category: 1,
        title: 'Calibration of the sea level dataset',
        raw: 'Which reference frame was used for the calibration?',
      });
      expect(http.calls[0].headers).toMatchObject({ 'Api-Username': 'test1' });
    });

    it('joins the validation errors of a 422', async () => {
      http.on('POST', `${FORUM}/posts.json`, 422, {
        action: 'create_post',
        errors: ['Title is too short', 'Body is too short'],
      });

      await expect(
        service.createTopic('test1', 1, 'short', 'short'),
      ).rejects.toThrow(
        new DiscourseRequestError('Title is too short-Body is too short'),
      );
    });
  });

  describe('createPost', () => {
    it('posts the reply into the topic', async () => {
      http.on('POST', `${FORUM}/posts.json`, 200, postFixture);

      await service.createPost('test1', 67, 'The reference frame is shared.');

      expect(http.calls[0].data).toEqual({
        topic_id: 67,
        raw: 'The reference frame is shared.',
      });
    });
  });

  describe('getTopic', () => {
    it('takes the creator from the topic details', async () => {
      http.on('GET', `${FORUM}/t/67.json`, 200, topicWithPostsFixture);

      const topic = await service.getTopic(67);

      expect(topic.username).toBe('test1');
      expect(topic.title).toBe('Calibration of the sea level dataset');
    });
  });

  describe('getTopicWithPosts', () => {
    it('requests the print view and returns the post stream', async () => {
      http.on('GET', `${FORUM}/t/67.json`, 200, topicWithPostsFixture);

      const { topic, posts } = await service.getTopicWithPosts(67);

      expect(http.calls[0].params).toEqual({ print: true });
      expect(topic.username).toBe('test1');
      expect(posts).toHaveLength(1);
      expect(posts[0].user_id).toBe(10);
    });
  });

  describe('editPost', () => {
    it('returns the post wrapped in the answer', async () => {
      http.on('PUT', `${FORUM}/posts/302.json`, 200, { post: postFixture });

      const post = await service.editPost(302, '[Content has been blocked]');

      expect(post.id).toBe(302);
      expect(http.calls[0].data).toEqual({ raw: '[Content has been blocked]' });
    });
  });

  describe('status classification', () => {
    it('hides a server error behind the generic message', async () => {
      http.on('GET', `${FORUM}/posts/302.json`, 502, '<html>Bad Gateway</html>');

      const pending = service.getPost(302);

      await expect(pending).rejects.toBeInstanceOf(DiscourseUnavailableError);
      await expect(pending).rejects.toHaveProperty(
        'publicMessage',
        DEFAULT_INTERNAL_ERROR_MESSAGE,
      );
    });

    it('reports a refused API key as an authentication failure', async () => {
      http.on('DELETE', `${FORUM}/t/67.json`, 403);

      await expect(service.deleteTopic(67)).rejects.toBeInstanceOf(
        DiscourseAuthenticationError,
      );
    });

    it('joins the errors of a rate limited answer', async () => {
      http.on('POST', `${FORUM}/posts.json`, 429, {
        errors: ['You have performed this action too many times'],
      });

      await expect(service.createPost('test1', 67, 'text')).rejects.toThrow(
        new DiscourseRequestError('You have performed this action too many times'),
      );
    });

    it('treats a malformed payload as an unavailable forum', async () => {
      http.on('GET', `${FORUM}/posts/302.json`, 200, { id: 'not-a-number' });

      await expect(service.getPost(302)).rejects.toBeInstanceOf(
        DiscourseUnavailableError,
      );
    });

    it('treats a connection failure as an unavailable forum', async () => {
      await expect(service.getPost(302)).rejects.toBeInstanceOf(
        DiscourseUnavailableError,
      );
    });
  });
});

describe('isPlaceholderTopic', () => {
  it('matches the topic the forum opens with each category', () => {
    expect(isPlaceholderTopic('About the 1 category')).toBe(true);
    expect(isPlaceholderTopic(`About the 424242_${ASSET_ID} category`)).toBe(
      true,
    );
  });

  it('keeps regular topics', () => {
    expect(isPlaceholderTopic('About the gridding category')).toBe(false);
    expect(isPlaceholderTopic('Question: About the 1 category')).toBe(false);
  });
});
