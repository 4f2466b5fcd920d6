import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CredentialsCipher } from './credentials-cipher.service';

@Module({
  imports: [ConfigModule],
  providers: [CredentialsCipher],
  exports: [CredentialsCipher],
})
export class CredentialsModule {}
