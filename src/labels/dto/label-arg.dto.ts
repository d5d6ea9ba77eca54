import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsDefined, IsIn, IsOptional, IsString } from 'class-validator';

export const ARG_TYPES = ['string', 'number', 'boolean', 'date'] as const;
export type ArgType = (typeof ARG_TYPES)[number];

export class LabelArgDto {
  @ApiProperty({
    description: 'Argument value; dates are ISO 8601 strings or epoch millis',
    oneOf: [{ type: 'string' }, { type: 'number' }, { type: 'boolean' }],
    example: 3,
  })
  @IsDefined()
  value!: unknown;

  @ApiPropertyOptional({
    description: 'How to read `value`; inferred from the JSON type when absent',
    enum: [...ARG_TYPES],
  })
  @IsOptional()
  @IsIn(ARG_TYPES)
  type?: ArgType;

  @ApiPropertyOptional({
    description:
      "Overrides the placeholder's style for this call (e.g. dd/MM/yyyy)",
    example: 'dd/MM/yyyy',
  })
  @IsOptional()
  @IsString()
  style?: string;
}
