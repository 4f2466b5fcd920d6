import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import axios from 'axios';
import { ZOOM_HTTP_CLIENT, ZoomApiClient } from './zoom-api.client';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: ZOOM_HTTP_CLIENT,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        axios.create({ timeout: Number(config.get<string>('ZOOM_HTTP_TIMEOUT_MS', '30000')) }),
    },
    ZoomApiClient,
  ],
  exports: [ZoomApiClient],
})
export class ZoomModule {}
