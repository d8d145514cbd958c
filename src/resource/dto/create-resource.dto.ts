import {
  IsString,
  IsNotEmpty,
  IsEnum,
  IsInt,
  IsPositive,
  IsOptional,
  MaxLength,
} from 'class-validator';
import { ResourceCategory } from '../entities/resource.entity';

export class CreateResourceDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @IsEnum(ResourceCategory)
  category!: ResourceCategory;

  @IsInt()
  @IsPositive()
  capacity!: number;

  @IsString()
  @IsOptional()
  @MaxLength(255)
  location?: string;

  @IsString()
  @IsOptional()
  description?: string;
}
