import { Injectable, Logger } from '@nestjs/common';
import { ExtractionPlan, RunSummary } from '../application/ports/input';
import { CatalogueRow } from '../domain/entities/catalogue-record.entity';
import { SkyPositionVO } from '../domain/value-objects/sky-position.vo';
import { MalformedResponseError } from '../domain/errors/archive.errors';
import { blockComponentsQuery, blockCubesQuery } from './adql';
import { CutoutsOptionsDto } from './dto/workflow-options.dto';
import {
  WorkflowContext,
  WorkflowRunnerService,
  emptySummary,
} from './workflow-runner.service';
import { CUTOUT_SERVICE, IMAGE_DOWNLOAD_SERVICE } from './service-names';

function componentPosition(row: CatalogueRow): SkyPositionVO {
  const ra = Number(row.ra_deg_cont);
  const dec = Number(row.dec_deg_cont);
  if (!row.ra_deg_cont || !row.dec_deg_cont || !Number.isFinite(ra) || !Number.isFinite(dec)) {
    throw new MalformedResponseError('Continuum component row has no ra_deg_cont/dec_deg_cont');
  }
  return SkyPositionVO.create({ ra, dec });
}

/**
 * Cutouts Workflow
 * Cuts every bright continuum component of a scheduling block out of the
 * block's images and cubes, or downloads the full files instead
 */
@Injectable()
export class CutoutsWorkflow {
  private readonly logger = new Logger(CutoutsWorkflow.name);

  constructor(private readonly runner: WorkflowRunnerService) {}

  async execute(context: WorkflowContext, options: CutoutsOptionsDto): Promise<RunSummary> {
    await this.runner.prepareDestination(context.destinationDir);

    const sbid = String(options.sbid);
    this.logger.log(`Finding images and cubes for scheduling block ${sbid}`);
    const records = await this.runner.findRecords(context.credentials, {
      kind: 'tap',
      adql: blockCubesQuery(sbid),
    });

    let plan: ExtractionPlan;
    if (options.fullFiles) {
      plan = { serviceName: IMAGE_DOWNLOAD_SERVICE, parameters: {} };
    } else {
      const components = await this.runner.findRows(
        context.credentials,
        blockComponentsQuery(options.sbid, options.minFlux),
      );
      this.logger.log(`Found ${components.length} component(s) above ${options.minFlux} mJy/beam`);

      if (components.length === 0) {
        return { ...emptySummary(), recordsFound: records.length };
      }

      plan = {
        serviceName: CUTOUT_SERVICE,
        parameters: {
          pos: components.map((row) => componentPosition(row).toCircle(options.radius)),
        },
      };
    }

    return this.runner.extract(context, records, () => plan);
  }
}
