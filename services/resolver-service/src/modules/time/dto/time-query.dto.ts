import { IsOptional, IsString } from "class-validator";

export class TimeQueryDto {
  @IsOptional()
  @IsString()
  timezone?: string;

  @IsOptional()
  @IsString()
  request_id?: string;
}
