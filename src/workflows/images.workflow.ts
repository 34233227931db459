import { Injectable, Logger } from '@nestjs/common';
import { RunSummary } from '../application/ports/input';
import { SkyPositionVO } from '../domain/value-objects/sky-position.vo';
import { ImagesOptionsDto } from './dto/workflow-options.dto';
import { WorkflowContext, WorkflowRunnerService } from './workflow-runner.service';
import { IMAGE_DOWNLOAD_SERVICE } from './service-names';

/**
 * Images Workflow
 * Downloads the full files of every image and cube covering a sky position
 */
@Injectable()
export class ImagesWorkflow {
  private readonly logger = new Logger(ImagesWorkflow.name);

  constructor(private readonly runner: WorkflowRunnerService) {}

  async execute(context: WorkflowContext, options: ImagesOptionsDto): Promise<RunSummary> {
    const position = SkyPositionVO.parse(options.ra, options.dec);
    await this.runner.prepareDestination(context.destinationDir);

    this.logger.log(`Finding images within ${options.radius} deg of ${position.toString()}`);
    const records = await this.runner.findRecords(context.credentials, {
      kind: 'sia',
      positions: [position.toCircle(options.radius)],
    });

    return this.runner.extract(context, records, () => ({
      serviceName: IMAGE_DOWNLOAD_SERVICE,
      parameters: {},
    }));
  }
}
