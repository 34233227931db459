import { Injectable, Logger } from '@nestjs/common';
import { RunSummary } from '../application/ports/input';
import { CatalogueRecord } from '../domain/entities/catalogue-record.entity';
import { SPECTRAL_CUBE_SUBTYPE } from './adql';
import { SpectraOptionsDto } from './dto/workflow-options.dto';
import { readSourceList } from './source-list';
import {
  WorkflowContext,
  WorkflowRunnerService,
  emptySummary,
} from './workflow-runner.service';
import { SPECTRUM_SERVICE } from './service-names';

/**
 * Spectra Workflow
 * Extracts spectra at each source position from every spectral cube covering it
 */
@Injectable()
export class SpectraWorkflow {
  private readonly logger = new Logger(SpectraWorkflow.name);

  constructor(private readonly runner: WorkflowRunnerService) {}

  async execute(context: WorkflowContext, options: SpectraOptionsDto): Promise<RunSummary> {
    const sources = await readSourceList(options.sourceFile);
    await this.runner.prepareDestination(context.destinationDir);

    if (sources.length === 0) {
      this.logger.warn(`No sources in ${options.sourceFile}`);
      return emptySummary();
    }

    const pos = sources.map((source) => source.toCircle(options.radius));
    const found = await this.runner.findRecords(context.credentials, {
      kind: 'sia',
      positions: pos,
    });
    const cubes = found.filter((record) =>
      CatalogueRecord.hasSubtype(record, [SPECTRAL_CUBE_SUBTYPE]),
    );
    this.logger.log(`${cubes.length} of ${found.length} data product(s) are spectral cubes`);

    return this.runner.extract(context, cubes, () => ({
      serviceName: SPECTRUM_SERVICE,
      parameters: { pos },
    }));
  }
}
