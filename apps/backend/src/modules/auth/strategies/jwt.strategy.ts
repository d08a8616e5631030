import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { parseRoles } from '@modules/access/enums/role.enum';
import { AuthenticatedUser } from '../interfaces/authenticated-user.interface';

const JwtClaimsSchema = z.object({
  sub: z.union([z.string().min(1), z.number().int()]).transform(String),
  username: z.string().min(1),
  displayName: z.string().optional(),
  name: z.string().optional(),
  email: z.string().optional(),
  roles: z.array(z.string()).default([]),
});

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  private readonly logger = new Logger(JwtStrategy.name);

  constructor(configService: ConfigService) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.getOrThrow<string>('JWT_SECRET'),
    });
  }

  validate(payload: unknown): AuthenticatedUser {
    const claims = JwtClaimsSchema.safeParse(payload);
    if (!claims.success) {
      this.logger.warn(`Rejected token claims: ${claims.error.message}`);
      throw new UnauthorizedException('Invalid token claims');
    }

    const { sub, username, displayName, name, email, roles } = claims.data;
    return {
      id: sub,
      username,
      displayName: displayName ?? name ?? username,
      ...(email !== undefined ? { email } : {}),
      roles: parseRoles(roles),
    };
  }
}
