import { Module } from '@nestjs/common';
import { ApplicationModule } from '../application/application.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { WorkflowRunnerService } from './workflow-runner.service';
import { ImagesWorkflow } from './images.workflow';
import { CutoutsWorkflow } from './cutouts.workflow';
import { SliceWorkflow } from './slice.workflow';
import { SourcesWorkflow } from './sources.workflow';
import { SpectraWorkflow } from './spectra.workflow';
import { ProjectCutoutsWorkflow } from './project-cutouts.workflow';

const WORKFLOWS = [
  ImagesWorkflow,
  CutoutsWorkflow,
  SliceWorkflow,
  SourcesWorkflow,
  SpectraWorkflow,
  ProjectCutoutsWorkflow,
];

@Module({
  imports: [ApplicationModule, InfrastructureModule],
  providers: [WorkflowRunnerService, ...WORKFLOWS],
  exports: [WorkflowRunnerService, ...WORKFLOWS],
})
export class WorkflowsModule {}
