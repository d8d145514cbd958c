import { DynamicModule, Module, Provider } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '../auth/auth.module';
import { StoreDriver } from '../config/database.config';
import { loadDemoResources } from './demo-resources';
import { Resource } from './entities/resource.entity';
import { InMemoryResourceRepository } from './repositories/in-memory-resource.repository';
import { ResourceRepository } from './repositories/resource.repository';
import { TypeOrmResourceRepository } from './repositories/typeorm-resource.repository';
import { ResourceController } from './resource.controller';
import { ResourceAdminService } from './services/resource-admin.service';
import { ResourceRegistryService } from './services/resource-registry.service';

export interface ResourceModuleOptions {
  store: StoreDriver;
  seedPath?: string;
}

@Module({})
export class ResourceModule {
  static register(options: ResourceModuleOptions): DynamicModule {
    const repositoryProvider: Provider =
      options.store === 'postgres'
        ? { provide: ResourceRepository, useClass: TypeOrmResourceRepository }
        : {
            provide: ResourceRepository,
            useFactory: () =>
              new InMemoryResourceRepository(
                options.seedPath ? loadDemoResources(options.seedPath) : [],
              ),
          };

    return {
      module: ResourceModule,
      imports: [
        AuthModule,
        ...(options.store === 'postgres'
          ? [TypeOrmModule.forFeature([Resource])]
          : []),
      ],
      controllers: [ResourceController],
      providers: [repositoryProvider, ResourceRegistryService, ResourceAdminService],
      exports: [ResourceRepository, ResourceRegistryService],
    };
  }
}
