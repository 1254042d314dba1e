import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator'

export class SubmitPlanDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  athleteName!: string

  @IsString()
  @IsOptional()
  @MaxLength(2000)
  goals?: string | null
}
