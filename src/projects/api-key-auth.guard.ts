import { CanActivate, ExecutionContext, Injectable, UnauthorizedException, createParamDecorator } from '@nestjs/common';
import { Request } from 'express';
import { ApiKeysService } from './api-keys.service';
import { Project } from './entities/project.entity';

export type ProjectRequest = Request & { project?: Project };

const AUTHORIZATION_PATTERN = /^(?:Token|Bearer)\s+(\S+)$/i;

/**
 * Authenticates `Authorization: Token <api key>` and scopes the request to the key's project.
 */
@Injectable()
export class ApiKeyAuthGuard implements CanActivate {
  constructor(private readonly apiKeysService: ApiKeysService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const req = context.switchToHttp().getRequest<ProjectRequest>();
    const header = req.headers.authorization;
    if (!header) {
      throw new UnauthorizedException('Authentication credentials were not provided.');
    }

    const match = AUTHORIZATION_PATTERN.exec(header.trim());
    const project = match ? await this.apiKeysService.authenticate(match[1]) : null;
    if (!project) {
      throw new UnauthorizedException('Invalid API key.');
    }

    req.project = project;
    return true;
  }
}

export const CurrentProject = createParamDecorator((_data: unknown, context: ExecutionContext): Project => {
  const req = context.switchToHttp().getRequest<ProjectRequest>();
  if (!req.project) {
    throw new UnauthorizedException('Authentication credentials were not provided.');
  }
  return req.project;
});
