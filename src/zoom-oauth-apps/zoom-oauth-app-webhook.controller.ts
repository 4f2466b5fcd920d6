import { Body, Controller, Headers, HttpCode, Param, Post, RawBodyRequest, Req } from '@nestjs/common';
import { Request } from 'express';
import { ZoomOAuthAppsService, ZoomWebhookResult } from './zoom-oauth-apps.service';

/** Event notifications Zoom sends for one app. Needs the app created with `rawBody: true`. */
@Controller('external_webhooks/zoom/oauth_apps')
export class ZoomOAuthAppWebhookController {
  constructor(private readonly appsService: ZoomOAuthAppsService) {}

  @Post(':objectId')
  @HttpCode(200)
  handle(
    @Param('objectId') objectId: string,
    @Req() req: RawBodyRequest<Request>,
    @Headers('x-zm-request-timestamp') timestamp: string | undefined,
    @Headers('x-zm-signature') signature: string | undefined,
    @Body() body: unknown,
  ): Promise<ZoomWebhookResult> {
    const raw = req.rawBody?.toString('utf8') ?? JSON.stringify(body ?? {});
    return this.appsService.handleZoomWebhook(objectId, body, raw, { timestamp, signature });
  }
}
