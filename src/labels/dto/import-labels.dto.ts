import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsArray,
  IsNotEmpty,
  IsString,
  ValidateNested,
} from 'class-validator';
import { SaveVariantDto } from './save-variant.dto';

export class LabelRecordDto {
  @ApiProperty({ example: 'travel-bot' })
  @IsString()
  @IsNotEmpty()
  namespace!: string;

  @ApiProperty({ example: 'travel_bot_booking_your_trip_is_booked' })
  @IsString()
  @IsNotEmpty()
  key!: string;

  @ApiProperty({ example: 'en' })
  @IsString()
  @IsNotEmpty()
  defaultLocale!: string;

  @ApiProperty({ example: 'Your trip is booked' })
  @IsString()
  defaultText!: string;

  @ApiProperty({ type: [SaveVariantDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SaveVariantDto)
  variants!: SaveVariantDto[];
}

export class ImportLabelsDto {
  @ApiProperty({ type: [LabelRecordDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LabelRecordDto)
  labels!: LabelRecordDto[];
}
