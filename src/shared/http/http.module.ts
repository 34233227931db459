import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Agent } from 'undici';
import { AppConfig } from '../../config/configuration';
import { HTTP_DISPATCHER, HttpClientService } from './http-client.service';

@Module({
  providers: [
    {
      provide: HTTP_DISPATCHER,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig>) => {
        const http = configService.get('http', { infer: true });
        return new Agent({
          connections: 4,
          keepAliveTimeout: 30000,
          keepAliveMaxTimeout: 60000,
          connectTimeout: http?.timeoutMs,
        });
      },
    },
    HttpClientService,
  ],
  exports: [HttpClientService],
})
export class HttpModule {}
