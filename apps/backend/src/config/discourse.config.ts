import { registerAs } from '@nestjs/config';

export interface DiscourseConfig {
  host: string;
  apiKey: string;
  systemUsername: string;
  sslCheck: boolean;
  userEmailDomain: string;
  userPassword: string;
}

export default registerAs(
  'discourse',
  (): DiscourseConfig => ({
    host: process.env.DISCOURSE_HOST || 'http://localhost:4200',
    apiKey: process.env.DISCOURSE_API_KEY || '',
    systemUsername: process.env.DISCOURSE_SYSTEM_USERNAME || 'system',
    sslCheck: process.env.DISCOURSE_SSL_CHECK !== 'false',
    // Forum accounts are provisioned with a placeholder identity, the
    // service always impersonates them through Api-Username
    userEmailDomain:
      process.env.DISCOURSE_USER_EMAIL_DOMAIN || 'discussion.local',
    userPassword:
      process.env.DISCOURSE_USER_PASSWORD || 'discussion-placeholder-2024',
  }),
);
