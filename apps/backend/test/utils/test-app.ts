import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { HttpService } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';
import { PassportModule } from '@nestjs/passport';
import { getRepositoryToken } from '@nestjs/typeorm';
import { getQueueToken } from '@nestjs/bull';
import { AppController } from '../../src/app.controller';
import { discourseConfig, servicesConfig } from '../../src/config';
import { DiscussionController } from '@modules/discussion/discussion.controller';
import { DiscussionService } from '@modules/discussion/discussion.service';
import { DiscourseService } from '@modules/discourse/discourse.service';
import { DiscourseApiClient } from '@modules/discourse/discourse-api.client';
import { AssetCategoryService } from '@modules/asset-category/asset-category.service';
import { AssetCategory } from '@modules/asset-category/entities/asset-category.entity';
import { ModerationEventPublisher } from '@modules/moderation/moderation-event.publisher';
import { NotificationService } from '@modules/notification/notification.service';
import { MessagePublisherService } from '@modules/queue/services/message-publisher.service';
import {
  MODERATION_QUEUE,
  NOTIFICATION_QUEUE,
} from '@modules/queue/queue.constants';
import { AuthServiceClient } from '@modules/collaborators/auth-service.client';
import { AssetServiceClient } from '@modules/collaborators/asset-service.client';
import { JwtStrategy } from '@modules/auth/strategies/jwt.strategy';
import { FakeHttpService } from './fake-http.service';
import { InMemoryAssetCategoryRepository } from './in-memory-asset-category.repository';

export interface FakeQueue {
  add: jest.Mock;
}

export interface TestContext {
  app: INestApplication;
  http: FakeHttpService;
  repository: InMemoryAssetCategoryRepository;
  moderationQueue: FakeQueue;
  notificationQueue: FakeQueue;
}

const fakeQueue = (): FakeQueue => ({
  add: jest.fn(
    async (_name: string, _data: unknown, options?: { jobId?: string }) => ({
      id: options?.jobId ?? 1,
    }),
  ),
});

/**
 * The discussion API wired to in-process collaborators: the forum, auth and
 * asset services answer from a FakeHttpService, the association table lives
 * in memory and the Bull queues only record jobs.
 */
export async function createTestApp(): Promise<TestContext> {
  const http = new FakeHttpService();
  const repository = new InMemoryAssetCategoryRepository();
  const moderationQueue = fakeQueue();
  const notificationQueue = fakeQueue();

  const moduleRef = await Test.createTestingModule({
    imports: [
      ConfigModule.forRoot({
        isGlobal: true,
        ignoreEnvFile: true,
        load: [discourseConfig, servicesConfig],
      }),
      PassportModule.register({ defaultStrategy: 'jwt' }),
    ],
    controllers: [AppController, DiscussionController],
    providers: [
      DiscussionService,
      DiscourseApiClient,
      DiscourseService,
      AssetCategoryService,
      ModerationEventPublisher,
      NotificationService,
      MessagePublisherService,
      AuthServiceClient,
      AssetServiceClient,
      JwtStrategy,
      { provide: HttpService, useValue: http },
      { provide: getRepositoryToken(AssetCategory), useValue: repository },
      { provide: getQueueToken(MODERATION_QUEUE), useValue: moderationQueue },
      {
        provide: getQueueToken(NOTIFICATION_QUEUE),
        useValue: notificationQueue,
      },
    ],
  }).compile();

  const app = moduleRef.createNestApplication({ logger: false });
  await app.init();

  return { app, http, repository, moderationQueue, notificationQueue };
}
