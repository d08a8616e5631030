import { JwtService } from '@nestjs/jwt';

const jwt = new JwtService({ secret: 'test-secret' });

export interface TestIdentity {
  sub: string;
  username: string;
  displayName: string;
  email?: string;
  roles: string[];
}

export const identities = {
  author: {
    sub: 'u-10',
    username: 'test1',
    displayName: 'Test One',
    email: 'test1@users.test',
    roles: ['user'],
  },
  reader: {
    sub: 'u-42',
    username: 'jdoe',
    displayName: 'Jane Doe',
    email: 'jdoe@users.test',
    roles: ['user'],
  },
  moderator: {
    sub: 'u-50',
    username: 'mod',
    displayName: 'Forum Moderator',
    roles: ['Moderator'],
  },
  admin: {
    sub: 'u-1',
    username: 'boss',
    displayName: 'Forum Admin',
    email: 'boss@users.test',
    roles: ['ADMIN'],
  },
} satisfies Record<string, TestIdentity>;

export const bearer = (identity: TestIdentity): string =>
  `Bearer ${jwt.sign({ ...identity })}`;
