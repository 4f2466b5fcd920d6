import { Body, Controller, Delete, Get, HttpCode, Param, Post, Res, UseGuards } from '@nestjs/common';
import { Response } from 'express';
import { ApiKeyAuthGuard, CurrentProject } from '../projects/api-key-auth.guard';
import { Project } from '../projects/entities/project.entity';
import { CreateOrUpdateZoomOAuthAppDto } from './dto/create-or-update-zoom-oauth-app.dto';
import { serializeZoomOAuthApp } from './zoom-oauth-app.serializer';
import { ZoomOAuthAppsService } from './zoom-oauth-apps.service';

@Controller('api/v1/zoom_oauth_apps')
@UseGuards(ApiKeyAuthGuard)
export class ZoomOAuthAppsController {
  constructor(private readonly appsService: ZoomOAuthAppsService) {}

  @Get()
  async list(@CurrentProject() project: Project) {
    const apps = await this.appsService.list(project);
    return apps.map(serializeZoomOAuthApp);
  }

  @Post()
  async createOrUpdate(
    @CurrentProject() project: Project,
    @Body() dto: CreateOrUpdateZoomOAuthAppDto,
    @Res() res: Response,
  ): Promise<void> {
    const { app, created } = await this.appsService.createOrUpdate(project, dto);
    res.status(created ? 201 : 200).json(serializeZoomOAuthApp(app));
  }

  @Delete(':objectId')
  @HttpCode(204)
  async remove(@CurrentProject() project: Project, @Param('objectId') objectId: string): Promise<void> {
    await this.appsService.delete(project, objectId);
  }
}
