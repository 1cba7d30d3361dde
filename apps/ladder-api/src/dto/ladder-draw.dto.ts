import { IsInt, IsNumber, IsOptional, IsString, Max, MaxLength, Min } from "class-validator";

export class LadderDrawDto {
  @IsOptional()
  @IsInt()
  @Min(2)
  playerCount?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  levelCount?: number;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(1)
  rungProbability?: number;

  @IsOptional()
  @IsString()
  @MaxLength(2000)
  playerNames?: string;

  @IsOptional()
  @IsString()
  @MaxLength(2000)
  outcomeNames?: string;

  @IsOptional()
  @IsString()
  @MaxLength(128)
  seed?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  highlight?: number;
}
