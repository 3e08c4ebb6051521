import { HttpModule } from "@nestjs/axios";
import { Module } from "@nestjs/common";
import {
  CLOUDFLARE_API_BASE_URL_TOKEN,
  DEFAULT_CLOUDFLARE_API_BASE_URL,
} from "./cloudflare.constants";
import { CloudflareDnsService } from "./cloudflare-dns.service";

@Module({
  imports: [HttpModule],
  providers: [
    CloudflareDnsService,
    {
      provide: CLOUDFLARE_API_BASE_URL_TOKEN,
      useFactory: (): string =>
        process.env.CLOUDFLARE_API_BASE_URL?.trim() ||
        DEFAULT_CLOUDFLARE_API_BASE_URL,
    },
  ],
  exports: [CloudflareDnsService],
})
export class CloudflareModule {}
