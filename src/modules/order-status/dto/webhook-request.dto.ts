import { ArrayNotEmpty, IsArray, IsOptional, IsString } from 'class-validator';

/**
 * Outer shape of a WhatsApp Cloud API webhook. The message itself is read
 * by `extractInboundMessage`.
 */
export class WebhookRequestDto {
  @IsOptional()
  @IsString()
  object?: string;

  @IsArray()
  @ArrayNotEmpty()
  entry!: unknown[];
}
