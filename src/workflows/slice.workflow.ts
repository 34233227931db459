import { Injectable, Logger } from '@nestjs/common';
import { ExtractionPlan, RunSummary } from '../application/ports/input';
import { CatalogueRecord } from '../domain/entities/catalogue-record.entity';
import { ChannelSlicingVO } from '../domain/value-objects/channel-slicing.vo';
import { blockChannelCubesQuery } from './adql';
import { SliceOptionsDto } from './dto/workflow-options.dto';
import { WorkflowContext, WorkflowRunnerService } from './workflow-runner.service';
import { CUTOUT_SERVICE } from './service-names';

/**
 * Channel slices of one cube, or null when the record has no usable spectral axis
 */
export function slicePlan(record: CatalogueRecord, channelsPerCube: number): ExtractionPlan | null {
  const axis = record.spectralAxis;
  if (
    !axis ||
    !Number.isInteger(axis.channels) ||
    axis.channels < 1 ||
    !ChannelSlicingVO.isUsableRange(axis.emMin, axis.emMax)
  ) {
    return null;
  }

  const slicing = ChannelSlicingVO.create({ totalChannels: axis.channels, channelsPerCube });
  return {
    serviceName: CUTOUT_SERVICE,
    parameters: { band: slicing.toBandParameters(axis.emMin, axis.emMax) },
  };
}

/**
 * Slice Workflow
 * Splits every multi-channel cube of a scheduling block into smaller cubes
 * of a fixed number of channels
 */
@Injectable()
export class SliceWorkflow {
  private readonly logger = new Logger(SliceWorkflow.name);

  constructor(private readonly runner: WorkflowRunnerService) {}

  async execute(context: WorkflowContext, options: SliceOptionsDto): Promise<RunSummary> {
    await this.runner.prepareDestination(context.destinationDir);

    const sbid = String(options.sbid);
    this.logger.log(`Finding ${options.type} cubes for scheduling block ${sbid}`);
    const records = await this.runner.findRecords(context.credentials, {
      kind: 'tap',
      adql: blockChannelCubesQuery(sbid, options.type),
    });

    return this.runner.extract(context, records, (record) => {
      const plan = slicePlan(record, options.numChannels);
      if (!plan) {
        this.logger.warn(`${record.id} has no usable spectral axis, skipping`);
      }
      return plan;
    });
  }
}
