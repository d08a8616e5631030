import { registerAs } from '@nestjs/config';

export interface ServicesConfig {
  authServiceUrl: string;
  assetServiceUrl: string;
  serviceName: string;
}

export default registerAs(
  'services',
  (): ServicesConfig => ({
    authServiceUrl: process.env.AUTH_SERVICE_URL || 'http://localhost:3002',
    assetServiceUrl: process.env.ASSET_SERVICE_URL || 'http://localhost:3003',
    // Name under which the moderation subsystem calls us back
    serviceName: process.env.SERVICE_NAME || 'discussion',
  }),
);
