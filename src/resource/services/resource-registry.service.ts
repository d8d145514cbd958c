import { Injectable } from '@nestjs/common';
import {
  NotFoundError,
  ResourceUnavailableError,
} from '../../common/errors/booking.errors';
import {
  Resource,
  ResourceCategory,
  ResourceStatus,
} from '../entities/resource.entity';
import { ResourceRepository } from '../repositories/resource.repository';

/**
 * Read-only view of bookable resources.
 */
@Injectable()
export class ResourceRegistryService {
  constructor(private readonly resourceRepository: ResourceRepository) {}

  async getResource(id: string): Promise<Resource> {
    const resource = await this.resourceRepository.findById(id);
    if (!resource) {
      throw new NotFoundError('resource', id);
    }
    return resource;
  }

  isBookable(resource: Resource): boolean {
    return resource.status === ResourceStatus.AVAILABLE;
  }

  assertBookable(resource: Resource): void {
    if (!this.isBookable(resource)) {
      throw new ResourceUnavailableError(resource.id, resource.status);
    }
  }

  async listResources(category?: ResourceCategory): Promise<Resource[]> {
    return await this.resourceRepository.findAll(category);
  }

  async countResources(): Promise<number> {
    return await this.resourceRepository.count();
  }
}
