import {
  IsString,
  IsNotEmpty,
  IsEnum,
  IsInt,
  IsPositive,
  IsOptional,
  MaxLength,
} from 'class-validator';
import { ResourceCategory, ResourceStatus } from '../entities/resource.entity';

export class UpdateResourceDto {
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  @MaxLength(255)
  name?: string;

  @IsEnum(ResourceCategory)
  @IsOptional()
  category?: ResourceCategory;

  @IsInt()
  @IsPositive()
  @IsOptional()
  capacity?: number;

  @IsEnum(ResourceStatus)
  @IsOptional()
  status?: ResourceStatus;

  @IsString()
  @IsOptional()
  @MaxLength(255)
  location?: string | null;

  @IsString()
  @IsOptional()
  description?: string | null;
}
