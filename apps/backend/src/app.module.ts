import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AppController } from './app.controller';
import { discourseConfig, getDatabaseConfig, servicesConfig } from './config';
import { DiscussionModule } from '@modules/discussion/discussion.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [discourseConfig, servicesConfig],
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: getDatabaseConfig,
    }),
    DiscussionModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
