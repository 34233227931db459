import { Injectable, Logger } from '@nestjs/common';
import { join } from 'path';
import { RunSummary } from '../application/ports/input';
import { cubeByIdQuery } from './adql';
import { SourcesOptionsDto } from './dto/workflow-options.dto';
import { readSourceList } from './source-list';
import {
  WorkflowContext,
  WorkflowRunnerService,
  emptySummary,
} from './workflow-runner.service';
import { CUTOUT_SERVICE } from './service-names';

/**
 * Sources Workflow
 * Cuts a list of sources out of one cube, into <dest>/<imageId>/
 */
@Injectable()
export class SourcesWorkflow {
  private readonly logger = new Logger(SourcesWorkflow.name);

  constructor(private readonly runner: WorkflowRunnerService) {}

  async execute(context: WorkflowContext, options: SourcesOptionsDto): Promise<RunSummary> {
    const sources = await readSourceList(options.sourceFile);
    const destinationDir = join(context.destinationDir, options.imageId);
    await this.runner.prepareDestination(destinationDir);

    if (sources.length === 0) {
      this.logger.warn(`No sources in ${options.sourceFile}`);
      return emptySummary();
    }

    const records = await this.runner.findRecords(context.credentials, {
      kind: 'tap',
      adql: cubeByIdQuery(options.imageId),
    });

    const pos = sources.map((source) => source.toCircle(options.radius));
    return this.runner.extract({ ...context, destinationDir }, records, () => ({
      serviceName: CUTOUT_SERVICE,
      parameters: { pos },
    }));
  }
}
