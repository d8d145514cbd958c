import { IsEnum, IsOptional } from 'class-validator';
import { ResourceCategory } from '../entities/resource.entity';

export class ListResourcesQueryDto {
  @IsEnum(ResourceCategory)
  @IsOptional()
  category?: ResourceCategory;
}
