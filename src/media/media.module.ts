import { Module } from '@nestjs/common';
import { MediaResolverService } from './media-resolver.service';

@Module({
  providers: [MediaResolverService],
  exports: [MediaResolverService],
})
export class MediaModule {}
