import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';
import { JwtStrategy } from './strategies/jwt.strategy';
import { OptionalJwtAuthGuard } from './guards/optional-jwt-auth.guard';
import { RolesGuard } from '@modules/access/guards/roles.guard';

@Module({
  imports: [PassportModule.register({ defaultStrategy: 'jwt' })],
  providers: [JwtStrategy, OptionalJwtAuthGuard, RolesGuard],
  exports: [PassportModule, OptionalJwtAuthGuard, RolesGuard],
})
export class AuthModule {}
