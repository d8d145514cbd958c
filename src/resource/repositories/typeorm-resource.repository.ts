import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Resource, ResourceCategory } from '../entities/resource.entity';
import { ResourceRepository } from './resource.repository';

@Injectable()
export class TypeOrmResourceRepository extends ResourceRepository {
  constructor(
    @InjectRepository(Resource)
    private readonly resourceRepository: Repository<Resource>,
  ) {
    super();
  }

  async findById(id: string): Promise<Resource | null> {
    return await this.resourceRepository.findOne({ where: { id } });
  }

  async findAll(category?: ResourceCategory): Promise<Resource[]> {
    return await this.resourceRepository.find({
      where: category ? { category } : {},
      order: { name: 'ASC' },
    });
  }

  async save(resource: Resource): Promise<Resource> {
    return await this.resourceRepository.save(resource);
  }

  async count(): Promise<number> {
    return await this.resourceRepository.count();
  }
}
