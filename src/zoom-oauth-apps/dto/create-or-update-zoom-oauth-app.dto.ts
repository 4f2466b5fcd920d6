import { IsOptional, IsString } from 'class-validator';

/** Blank secrets on an existing app keep their stored values. */
export class CreateOrUpdateZoomOAuthAppDto {
  @IsOptional()
  @IsString()
  client_id?: string;

  @IsOptional()
  @IsString()
  client_secret?: string;

  @IsOptional()
  @IsString()
  webhook_secret?: string;
}
