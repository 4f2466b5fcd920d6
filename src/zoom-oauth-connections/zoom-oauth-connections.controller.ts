import { Body, Controller, Delete, Get, Param, Patch, Post, Query, Req, UseGuards } from '@nestjs/common';
import { Request } from 'express';
import { ApiKeyAuthGuard, CurrentProject } from '../projects/api-key-auth.guard';
import { Project } from '../projects/entities/project.entity';
import { CreateZoomOAuthConnectionDto } from './dto/create-zoom-oauth-connection.dto';
import { ListZoomOAuthConnectionsQuery } from './dto/list-zoom-oauth-connections.query';
import { UpdateZoomOAuthConnectionDto } from './dto/update-zoom-oauth-connection.dto';
import { SyncZoomOAuthConnectionTask } from './tasks/sync-zoom-oauth-connection.task';
import { serializeZoomOAuthConnection } from './zoom-oauth-connection.serializer';
import { ZoomOAuthConnectionsService } from './zoom-oauth-connections.service';

@Controller('api/v1/zoom_oauth_connections')
@UseGuards(ApiKeyAuthGuard)
export class ZoomOAuthConnectionsController {
  constructor(
    private readonly connectionsService: ZoomOAuthConnectionsService,
    private readonly syncTask: SyncZoomOAuthConnectionTask,
  ) {}

  @Get()
  async list(@CurrentProject() project: Project, @Query() query: ListZoomOAuthConnectionsQuery, @Req() req: Request) {
    const page = await this.connectionsService.list(project, query.cursor);
    return {
      next: page.nextCursor ? this.pageUrl(req, page.nextCursor) : null,
      previous: page.previousCursor ? this.pageUrl(req, page.previousCursor) : null,
      results: page.results.map(serializeZoomOAuthConnection),
    };
  }

  @Post()
  async create(@CurrentProject() project: Project, @Body() dto: CreateZoomOAuthConnectionDto) {
    const connection = await this.connectionsService.create(project, dto);
    // Immediately sync the new connection
    this.syncTask.enqueue(connection.id);
    return serializeZoomOAuthConnection(connection);
  }

  @Get(':objectId')
  async get(@CurrentProject() project: Project, @Param('objectId') objectId: string) {
    return serializeZoomOAuthConnection(await this.connectionsService.get(project, objectId));
  }

  @Patch(':objectId')
  async update(
    @CurrentProject() project: Project,
    @Param('objectId') objectId: string,
    @Body() dto: UpdateZoomOAuthConnectionDto,
  ) {
    const connection = await this.connectionsService.updateMetadata(project, objectId, dto.metadata);
    return serializeZoomOAuthConnection(connection);
  }

  @Delete(':objectId')
  async remove(@CurrentProject() project: Project, @Param('objectId') objectId: string) {
    return serializeZoomOAuthConnection(await this.connectionsService.delete(project, objectId));
  }

  private pageUrl(req: Request, cursor: string): string {
    return `${req.protocol}://${req.get('host') ?? 'localhost'}${req.path}?cursor=${encodeURIComponent(cursor)}`;
  }
}
