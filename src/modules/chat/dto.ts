import { Transform, TransformFnParams } from "class-transformer";
import { ArrayMaxSize, IsArray, IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Max, MaxLength, Min } from "class-validator";
import { SEX_VALUES, Sex } from "../sessions/session.types";

const trim = ({ value }: TransformFnParams): unknown => (typeof value === "string" ? value.trim() : value);
const trimLower = ({ value }: TransformFnParams): unknown =>
  typeof value === "string" ? value.trim().toLowerCase() : value;

export class IntakeDto {
  @Transform(trim) @IsString() @IsNotEmpty() @MaxLength(128) user_id!: string;
  @Transform(trim) @IsString() @IsNotEmpty() @MaxLength(200) cancer_type!: string;
  @Transform(trim) @IsString() @MaxLength(100) stage!: string;
  @IsInt() @Min(0) @Max(130) age!: number;
  @Transform(trimLower) @IsString() @IsIn(SEX_VALUES) sex!: Sex;
  @Transform(trim) @IsString() @IsNotEmpty() @MaxLength(200) location!: string;
  @IsOptional() @IsArray() @ArrayMaxSize(50) @IsString({ each: true }) comorbidities?: string[];
  @IsOptional() @IsArray() @ArrayMaxSize(50) @IsString({ each: true }) prior_treatments?: string[];
}

export class MessageDto {
  @Transform(trim) @IsString() @IsNotEmpty() @MaxLength(128) user_id!: string;
  @IsString() @IsNotEmpty() @MaxLength(2000) message!: string;
}

export class EndSessionDto {
  @Transform(trim) @IsString() @IsNotEmpty() @MaxLength(128) user_id!: string;
}
