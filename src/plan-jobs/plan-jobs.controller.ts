import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Get,
  GoneException,
  Header,
  HttpCode,
  HttpException,
  NotFoundException,
  Param,
  Post,
  StreamableFile,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common'
import { SubmitPlanDto } from './dto/submit-plan.dto'
import { PlanArtifactResolver, type ArtifactResolution } from './plan-artifact.resolver'
import { PlanJobStatusService } from './plan-job-status.service'
import { PlanJobSubmissionService } from './plan-job-submission.service'
import type { PlanJobStatusView } from './plan-job.types'

@Controller('training-plan')
export class PlanJobsController {
  constructor(
    private readonly submissionService: PlanJobSubmissionService,
    private readonly statusService: PlanJobStatusService,
    private readonly artifactResolver: PlanArtifactResolver,
  ) {}

  @Post()
  @HttpCode(202)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  async submit(@Body() dto: SubmitPlanDto) {
    const result = await this.submissionService.submit(dto.athleteName, dto.goals)
    if (result.accepted) {
      return { accepted: true, jobKey: result.jobKey, message: result.message }
    }
    if (result.reason === 'invalid_athlete_name') {
      throw new BadRequestException({ accepted: false, reason: result.message })
    }
    throw new ConflictException({ accepted: false, reason: result.message })
  }

  @Get(':athleteName/status')
  @Header('Cache-Control', 'no-store')
  async status(@Param('athleteName') athleteName: string): Promise<PlanJobStatusView> {
    return this.statusService.getStatus(athleteName)
  }

  @Get(':athleteName/download')
  async download(@Param('athleteName') athleteName: string): Promise<StreamableFile> {
    const resolution = await this.artifactResolver.resolve(athleteName)
    if (!resolution.ok) {
      throw downloadError(resolution)
    }

    const { artifact } = resolution
    return new StreamableFile(artifact.open(), {
      type: artifact.contentType,
      disposition: `attachment; filename="${artifact.fileName}"`,
      length: artifact.sizeBytes,
    })
  }
}

function downloadError(resolution: Extract<ArtifactResolution, { ok: false }>): HttpException {
  const body = { error: resolution.error, ...resolution.status }
  switch (resolution.error) {
    case 'not_found':
      return new NotFoundException(body)
    case 'not_ready':
      return new ConflictException(body)
    case 'artifact_missing':
      return new GoneException(body)
  }
}
