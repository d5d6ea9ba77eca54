import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { INTERFACE_TYPES, InterfaceType } from '../label.types';

export class RenderResponseDto {
  @ApiProperty({ example: 'Votre voyage est réservé' })
  text!: string;

  @ApiPropertyOptional({ example: 'travel_bot_booking_your_trip_is_booked' })
  key?: string;

  @ApiPropertyOptional({
    description: 'Whether the wording was reviewed',
    example: true,
  })
  validated?: boolean;

  @ApiPropertyOptional({
    description: 'True when this render created the label',
    example: false,
  })
  freshlyCreated?: boolean;
}

export class VariantResponseDto {
  @ApiProperty({ example: 'fr' })
  locale!: string;

  @ApiPropertyOptional({ example: 'messenger' })
  connectorType?: string;

  @ApiPropertyOptional({ enum: [...INTERFACE_TYPES] })
  interfaceType?: InterfaceType;

  @ApiProperty({ example: ['Bonjour !'], type: [String] })
  alternatives!: string[];

  @ApiProperty({ example: true })
  validated!: boolean;
}

export class LabelResponseDto {
  @ApiProperty({ example: 'travel-bot' })
  namespace!: string;

  @ApiProperty({ example: 'travel_bot_booking_your_trip_is_booked' })
  key!: string;

  @ApiProperty({ example: 'en' })
  defaultLocale!: string;

  @ApiProperty({ example: 'Your trip is booked' })
  defaultText!: string;

  @ApiProperty({ type: [VariantResponseDto] })
  variants!: VariantResponseDto[];
}

export class UsageResponseDto {
  @ApiProperty({ example: 'fr' })
  locale!: string;

  @ApiPropertyOptional({ example: 'messenger' })
  connectorType?: string;

  @ApiPropertyOptional({ enum: [...INTERFACE_TYPES] })
  interfaceType?: InterfaceType;

  @ApiProperty({ example: 42 })
  count!: number;

  @ApiProperty({ example: '2024-01-01T00:00:00.000Z' })
  lastUsedAt!: Date;
}

export class ImportSummaryDto {
  @ApiProperty({ example: 3 })
  created!: number;

  @ApiProperty({ example: 1 })
  updated!: number;

  @ApiProperty({ example: 2 })
  added!: number;

  @ApiProperty({ example: 0 })
  skipped!: number;
}
