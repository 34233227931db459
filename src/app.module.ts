import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { WorkflowsModule } from './workflows/workflows.module';

/**
 * Application Module
 * Command line client for the archive's TAP, SIA2, DataLink and SODA services.
 * Built per invocation so command line options can override configuration.
 */
@Module({})
export class AppModule {
  static register(overrides: Record<string, string> = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [ConfigModule.register(overrides), SharedModule, WorkflowsModule],
    };
  }
}
