import { IsObject } from 'class-validator';

export class UpdateZoomOAuthConnectionDto {
  @IsObject()
  metadata!: Record<string, unknown>;
}
