import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  Resource,
  ResourceCategory,
  ResourceStatus,
} from '../entities/resource.entity';
import { ResourceRepository } from '../repositories/resource.repository';
import { ResourceRegistryService } from './resource-registry.service';

export interface NewResource {
  name: string;
  category: ResourceCategory;
  capacity: number;
  location?: string;
  description?: string;
}

/**
 * Omitted fields keep their value; `null` clears location or description.
 */
export interface ResourcePatch {
  name?: string;
  category?: ResourceCategory;
  capacity?: number;
  status?: ResourceStatus;
  location?: string | null;
  description?: string | null;
}

@Injectable()
export class ResourceAdminService {
  private readonly logger = new Logger(ResourceAdminService.name);

  constructor(
    private readonly resourceRepository: ResourceRepository,
    private readonly registry: ResourceRegistryService,
  ) {}

  async createResource(input: NewResource): Promise<Resource> {
    const now = new Date();
    const resource = await this.resourceRepository.save({
      id: uuidv4(),
      name: input.name,
      category: input.category,
      capacity: input.capacity,
      status: ResourceStatus.AVAILABLE,
      location: input.location ?? null,
      description: input.description ?? null,
      created_at: now,
      updated_at: now,
    });

    this.logger.log(`Created resource ${resource.id} (${resource.category})`);
    return resource;
  }

  async updateResource(id: string, patch: ResourcePatch): Promise<Resource> {
    const existing = await this.registry.getResource(id);

    const updated: Resource = {
      ...existing,
      name: patch.name ?? existing.name,
      category: patch.category ?? existing.category,
      capacity: patch.capacity ?? existing.capacity,
      status: patch.status ?? existing.status,
      location: patch.location !== undefined ? patch.location : existing.location,
      description:
        patch.description !== undefined ? patch.description : existing.description,
      updated_at: new Date(),
    };

    if (updated.status !== existing.status) {
      this.logger.log(
        `Resource ${id} status ${existing.status} -> ${updated.status}`,
      );
    }

    return await this.resourceRepository.save(updated);
  }

  async retireResource(id: string): Promise<Resource> {
    return await this.updateResource(id, { status: ResourceStatus.RETIRED });
  }
}
