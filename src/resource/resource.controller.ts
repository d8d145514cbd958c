import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { RequireCapability } from '../auth/auth.decorators';
import { PrincipalGuard } from '../auth/principal.guard';
import { CreateResourceDto } from './dto/create-resource.dto';
import { ListResourcesQueryDto } from './dto/list-resources-query.dto';
import {
  ResourceResponseDto,
  toResourceResponse,
} from './dto/resource-response.dto';
import { UpdateResourceDto } from './dto/update-resource.dto';
import { ResourceAdminService } from './services/resource-admin.service';
import { ResourceRegistryService } from './services/resource-registry.service';

@Controller('resources')
@UseGuards(PrincipalGuard)
export class ResourceController {
  constructor(
    private readonly registry: ResourceRegistryService,
    private readonly adminService: ResourceAdminService,
  ) {}

  @Get()
  @RequireCapability('booking:read')
  async listResources(
    @Query() query: ListResourcesQueryDto,
  ): Promise<ResourceResponseDto[]> {
    const resources = await this.registry.listResources(query.category);
    return resources.map(toResourceResponse);
  }

  @Get(':id')
  @RequireCapability('booking:read')
  async getResource(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<ResourceResponseDto> {
    return toResourceResponse(await this.registry.getResource(id));
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @RequireCapability('resource:manage')
  async createResource(
    @Body() dto: CreateResourceDto,
  ): Promise<ResourceResponseDto> {
    return toResourceResponse(await this.adminService.createResource(dto));
  }

  @Patch(':id')
  @RequireCapability('resource:manage')
  async updateResource(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateResourceDto,
  ): Promise<ResourceResponseDto> {
    return toResourceResponse(await this.adminService.updateResource(id, dto));
  }

  @Delete(':id')
  @RequireCapability('resource:manage')
  async retireResource(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<ResourceResponseDto> {
    return toResourceResponse(await this.adminService.retireResource(id));
  }
}
