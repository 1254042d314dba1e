import { Module } from '@nestjs/common'
import { PlanArtifactStorage } from './plan-artifact.storage'

@Module({
  providers: [PlanArtifactStorage],
  exports: [PlanArtifactStorage],
})
export class PlanArtifactsModule {}
