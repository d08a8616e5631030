import { Test, TestingModule } from '@nestjs/testing';
import { HttpService } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';
import servicesConfig from '@config/services.config';
import {
  AssetRetrievalError,
  CollaboratorError,
} from '@common/exceptions/discussion.exceptions';
import { AssetServiceClient } from './asset-service.client';
import { FakeHttpService } from '../../../test/utils/fake-http.service';

const ASSET_ID = '7d0f3a52-5b7e-4c55-9a39-2f0f3e8d1a10';
const ASSET_URL = `http://assets.test/${ASSET_ID}`;

describe('AssetServiceClient', () => {
  let client: AssetServiceClient;
  let http: FakeHttpService;

  beforeEach(async () => {
    http = new FakeHttpService();

    const module: TestingModule = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [servicesConfig],
        }),
      ],
      providers: [AssetServiceClient, { provide: HttpService, useValue: http }],
    }).compile();

    client = module.get<AssetServiceClient>(AssetServiceClient);
  });

  it('returns the owner and name of the asset', async () => {
    http.on('GET', ASSET_URL, 200, {
      data: {
        public: {
          despUserId: 'u-7',
          name: 'Sea level anomalies',
          version: 3,
        },
      },
    });

    await expect(client.getAsset(ASSET_ID)).resolves.toEqual({
      ownerId: 'u-7',
      name: 'Sea level anomalies',
    });
  });

  it('treats an asset without despUserId as malformed', async () => {
    http.on('GET', ASSET_URL, 200, {
      data: { public: { ownerId: 'u-7', name: 'Sea level anomalies' } },
    });

    await expect(client.getAsset(ASSET_ID)).rejects.toThrow(
      new AssetRetrievalError(`Malformed asset ${ASSET_ID}`),
    );
  });

  it('raises an asset retrieval error on a refused lookup', async () => {
    http.on('GET', ASSET_URL, 404, { error: 'not found' });

    await expect(client.getAsset(ASSET_ID)).rejects.toThrow(
      new AssetRetrievalError('Asset service answered 404'),
    );
  });

  it('raises a coded collaborator error when unreachable', async () => {
    const pending = client.getAsset(ASSET_ID);

    await expect(pending).rejects.toBeInstanceOf(CollaboratorError);
    await expect(pending).rejects.toHaveProperty('code', 25002);
  });
});
