import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { INTERFACE_TYPES, InterfaceType } from '../label.types';
import { LabelArgDto } from './label-arg.dto';

export class RenderContextDto {
  @ApiProperty({ description: 'Target locale', example: 'fr' })
  @IsString()
  @IsNotEmpty()
  locale!: string;

  @ApiPropertyOptional({ description: 'Output channel', example: 'messenger' })
  @IsOptional()
  @IsString()
  connectorType?: string;

  @ApiPropertyOptional({ enum: [...INTERFACE_TYPES], example: 'text' })
  @IsOptional()
  @IsIn(INTERFACE_TYPES)
  interfaceType?: InterfaceType;
}

export class RawTextDto extends RenderContextDto {
  @ApiProperty({
    description: 'Text formatted as is, never stored or translated',
    example: 'Order 1234 shipped on {0,date,dd/MM/yyyy}',
  })
  @IsString()
  text!: string;

  @ApiPropertyOptional({ type: [LabelArgDto] })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LabelArgDto)
  args?: LabelArgDto[];
}

export class RenderLabelDto extends RawTextDto {
  @ApiProperty({ description: 'Deployment namespace', example: 'travel-bot' })
  @IsString()
  @IsNotEmpty()
  namespace!: string;

  @ApiProperty({
    description: 'Originating conversational unit, used for the key only',
    example: 'booking',
  })
  @IsString()
  category!: string;

  @ApiPropertyOptional({
    description: 'Explicit key, bypasses key derivation',
    example: 'booking_confirmation',
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  key?: string;
}
