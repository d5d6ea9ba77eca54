import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
} from 'class-validator';
import { INTERFACE_TYPES, InterfaceType } from '../label.types';

export class SaveVariantDto {
  @ApiProperty({ example: 'fr' })
  @IsString()
  @IsNotEmpty()
  locale!: string;

  @ApiPropertyOptional({ example: 'messenger' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  connectorType?: string;

  @ApiPropertyOptional({ enum: [...INTERFACE_TYPES] })
  @IsOptional()
  @IsIn(INTERFACE_TYPES)
  interfaceType?: InterfaceType;

  @ApiProperty({
    description: 'Interchangeable patterns, one picked at random per render',
    example: ['Bonjour !', 'Salut !'],
    type: [String],
  })
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  alternatives!: string[];

  @ApiProperty({ example: true })
  @IsBoolean()
  validated!: boolean;
}
