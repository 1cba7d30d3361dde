import { IsArray, IsInt, IsOptional, IsString, MaxLength, Min } from "class-validator";

export class LadderResolveDto {
  @IsInt()
  @Min(2)
  playerCount!: number;

  @IsArray()
  @IsArray({ each: true })
  layout!: boolean[][];

  @IsOptional()
  @IsString()
  @MaxLength(2000)
  playerNames?: string;

  @IsOptional()
  @IsString()
  @MaxLength(2000)
  outcomeNames?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  highlight?: number;
}
