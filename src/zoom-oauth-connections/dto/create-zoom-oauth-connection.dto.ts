import { IsNotEmpty, IsObject, IsOptional, IsString } from 'class-validator';

export class CreateZoomOAuthConnectionDto {
  @IsString()
  @IsNotEmpty()
  zoom_oauth_app_id!: string;

  @IsString()
  @IsNotEmpty()
  authorization_code!: string;

  @IsString()
  @IsNotEmpty()
  redirect_uri!: string;

  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;
}
