import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { createHash, randomBytes } from 'crypto';
import { Repository } from 'typeorm';
import { ApiKey } from './entities/api-key.entity';
import { Project } from './entities/project.entity';

@Injectable()
export class ApiKeysService {
  constructor(
    @InjectRepository(ApiKey)
    private readonly apiKeyRepo: Repository<ApiKey>,
  ) {}

  /** The plain key is returned once and never stored. */
  async create(project: Project, name: string): Promise<{ apiKey: ApiKey; plainKey: string }> {
    const plainKey = randomBytes(24).toString('base64url');
    const apiKey = await this.apiKeyRepo.save(
      this.apiKeyRepo.create({ projectId: project.id, name, keyHash: this.hash(plainKey) }),
    );
    return { apiKey, plainKey };
  }

  async authenticate(plainKey: string): Promise<Project | null> {
    const apiKey = await this.apiKeyRepo.findOne({
      where: { keyHash: this.hash(plainKey), disabled: false },
      relations: { project: true },
    });
    return apiKey?.project ?? null;
  }

  private hash(plainKey: string): string {
    return createHash('sha256').update(plainKey).digest('hex');
  }
}
