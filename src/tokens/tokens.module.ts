import { Module } from '@nestjs/common';
import { TokenClassifierService } from './token-classifier.service';

@Module({
  providers: [TokenClassifierService],
  exports: [TokenClassifierService],
})
export class TokensModule {}
