import { Module } from '@nestjs/common';
import { ScannerInputService } from './scanner-input.service';
import { StdinInputService } from './stdin-input.service';

@Module({
  providers: [ScannerInputService, StdinInputService],
  exports: [ScannerInputService, StdinInputService],
})
export class InputModule {}
