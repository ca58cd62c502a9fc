import { IsOptional, IsString } from "class-validator";

export class TimeQueryDto {
  @IsOptional()
  @IsString()
  timezone?: string;
}
