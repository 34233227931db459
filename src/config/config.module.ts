import { DynamicModule, Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { buildConfiguration } from './configuration';

@Global()
@Module({})
export class ConfigModule {
  /**
   * Register configuration from the process environment, with per-invocation
   * overrides (already expressed as environment variable names) applied on top.
   */
  static register(overrides: Record<string, string> = {}): DynamicModule {
    return {
      module: ConfigModule,
      imports: [
        NestConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => buildConfiguration({ ...process.env, ...overrides })],
          cache: true,
        }),
      ],
    };
  }
}
