import { Injectable, Logger } from '@nestjs/common';
import { join } from 'path';
import { RunSummary } from '../application/ports/input';
import { projectImagesNearQuery } from './adql';
import { ProjectCutoutsOptionsDto } from './dto/workflow-options.dto';
import { readSourceList } from './source-list';
import {
  WorkflowContext,
  WorkflowRunnerService,
  combineSummaries,
} from './workflow-runner.service';
import { CUTOUT_SERVICE } from './service-names';

/**
 * Project Cutouts Workflow
 * For each source, cuts it out of every continuum image of a survey project
 * that covers it, into <dest>/<project>/
 */
@Injectable()
export class ProjectCutoutsWorkflow {
  private readonly logger = new Logger(ProjectCutoutsWorkflow.name);

  constructor(private readonly runner: WorkflowRunnerService) {}

  async execute(context: WorkflowContext, options: ProjectCutoutsOptionsDto): Promise<RunSummary> {
    const sources = await readSourceList(options.sourceFile);
    const destinationDir = join(context.destinationDir, options.project);
    await this.runner.prepareDestination(destinationDir);

    const summaries: RunSummary[] = [];
    for (const [index, source] of sources.entries()) {
      this.logger.log(
        `Source ${index + 1} of ${sources.length} (${source.toString()}): finding ${options.project} images`,
      );

      const records = await this.runner.findRecords(context.credentials, {
        kind: 'tap',
        adql: projectImagesNearQuery(options.project, source),
      });

      const pos = [source.toCircle(options.radius)];
      summaries.push(
        await this.runner.extract({ ...context, destinationDir }, records, () => ({
          serviceName: CUTOUT_SERVICE,
          parameters: { pos },
        })),
      );
    }

    return combineSummaries(summaries);
  }
}
