import {
  Resource,
  ResourceCategory,
  ResourceStatus,
} from '../entities/resource.entity';

export class ResourceResponseDto {
  id!: string;
  name!: string;
  category!: ResourceCategory;
  capacity!: number;
  status!: ResourceStatus;
  location!: string | null;
  description!: string | null;
  createdAt!: string;
  updatedAt!: string;
}

export const toResourceResponse = (resource: Resource): ResourceResponseDto => ({
  id: resource.id,
  name: resource.name,
  category: resource.category,
  capacity: resource.capacity,
  status: resource.status,
  location: resource.location,
  description: resource.description,
  createdAt: resource.created_at.toISOString(),
  updatedAt: resource.updated_at.toISOString(),
});
