import { IsOptional, IsString } from 'class-validator';

export class ListZoomOAuthConnectionsQuery {
  @IsOptional()
  @IsString()
  cursor?: string;
}
