import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Put,
  ServiceUnavailableException,
  ValidationPipe,
} from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiServiceUnavailableResponse,
  ApiTags,
} from '@nestjs/swagger';
import {
  ArgType,
  ImportLabelsDto,
  ImportSummaryDto,
  LabelArgDto,
  LabelResponseDto,
  RawTextDto,
  RenderContextDto,
  RenderLabelDto,
  RenderResponseDto,
  SaveVariantDto,
  UsageResponseDto,
} from './dto';
import { ArgValue, LabelArg, withStyle } from './format/pattern.types';
import { LabelRenderer } from './label-renderer.service';
import {
  PatternFormatError,
  PatternParseError,
  StoreUnavailableError,
} from './label.errors';
import { Label, LocalizedVariant, RenderContext } from './label.types';
import { LabelsService } from './labels.service';

function toArgValue(dto: LabelArgDto, position: number): ArgValue {
  const { value } = dto;
  const inferred: ArgType =
    typeof value === 'number'
      ? 'number'
      : typeof value === 'boolean'
        ? 'boolean'
        : 'string';
  const type: ArgType = dto.type ?? inferred;
  const invalid = () =>
    new BadRequestException(`args[${position}] is not a valid ${type}`);

  switch (type) {
    case 'string':
      if (typeof value !== 'string') throw invalid();
      return value;
    case 'number': {
      const parsed = typeof value === 'string' ? Number(value) : value;
      if (typeof parsed !== 'number' || Number.isNaN(parsed)) throw invalid();
      return parsed;
    }
    case 'boolean':
      if (typeof value !== 'boolean') throw invalid();
      return value;
    case 'date': {
      if (typeof value !== 'string' && typeof value !== 'number') {
        throw invalid();
      }
      const date = new Date(value);
      if (Number.isNaN(date.getTime())) throw invalid();
      return date;
    }
  }
}

export function toLabelArgs(dtos: LabelArgDto[] = []): LabelArg[] {
  return dtos.map((dto, position) => {
    const value = toArgValue(dto, position);
    return dto.style !== undefined ? withStyle(value, dto.style) : value;
  });
}

function toContext(dto: RenderContextDto): RenderContext {
  return {
    locale: dto.locale,
    connectorType: dto.connectorType,
    interfaceType: dto.interfaceType,
  };
}

function toVariant(dto: SaveVariantDto): LocalizedVariant {
  return {
    locale: dto.locale,
    connectorType: dto.connectorType,
    interfaceType: dto.interfaceType,
    alternatives: dto.alternatives,
    validated: dto.validated,
  };
}

function toHttpError(error: unknown): unknown {
  if (error instanceof PatternParseError || error instanceof PatternFormatError) {
    return new BadRequestException(error.message);
  }
  if (error instanceof StoreUnavailableError) {
    return new ServiceUnavailableException(error.message);
  }
  return error;
}

@ApiTags('labels')
@Controller('api/labels')
export class LabelsController {
  constructor(
    private readonly renderer: LabelRenderer,
    private readonly labelsService: LabelsService,
  ) {}

  @Post('render')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Render a label',
    description:
      'Derives the key (unless given), resolves the best variant for the context and formats it. Unknown labels are created from the default text.',
  })
  @ApiOkResponse({ type: RenderResponseDto })
  @ApiBadRequestResponse({ description: 'Malformed pattern or arguments' })
  @ApiServiceUnavailableResponse({ description: 'Label store unavailable' })
  async render(
    @Body(new ValidationPipe({ transform: true })) dto: RenderLabelDto,
  ): Promise<RenderResponseDto> {
    const args = toLabelArgs(dto.args);
    try {
      const result = await this.renderer.renderWithDetails(
        {
          namespace: dto.namespace,
          category: dto.category,
          defaultText: dto.text,
          explicitKey: dto.key,
        },
        toContext(dto),
        args,
      );
      return {
        text: result.text,
        key: result.identifier.key,
        validated: result.resolved.validated,
        freshlyCreated: result.resolved.freshlyCreated,
      };
    } catch (error) {
      throw toHttpError(error);
    }
  }

  @Post('raw')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Format text without key, store or translation' })
  @ApiOkResponse({ type: RenderResponseDto })
  @ApiBadRequestResponse({ description: 'Malformed pattern or arguments' })
  raw(
    @Body(new ValidationPipe({ transform: true })) dto: RawTextDto,
  ): RenderResponseDto {
    const args = toLabelArgs(dto.args);
    try {
      return { text: this.renderer.raw(dto.text, toContext(dto), args) };
    } catch (error) {
      throw toHttpError(error);
    }
  }

  @Post('import')
  @ApiOperation({
    summary: 'Merge label records',
    description:
      'Validated variants overwrite; unvalidated variants are only added where none exists.',
  })
  @ApiOkResponse({ type: ImportSummaryDto })
  async import(
    @Body(new ValidationPipe({ transform: true })) dto: ImportLabelsDto,
  ): Promise<ImportSummaryDto> {
    return this.labelsService.importLabels(
      dto.labels.map((record) => ({
        identifier: { namespace: record.namespace, key: record.key },
        defaultLocale: record.defaultLocale,
        defaultText: record.defaultText,
        variants: record.variants.map(toVariant),
      })),
    );
  }

  @Get(':namespace/export')
  @ApiOperation({ summary: 'Export every label of a namespace' })
  @ApiOkResponse({ type: [LabelResponseDto] })
  async export(
    @Param('namespace') namespace: string,
  ): Promise<LabelResponseDto[]> {
    const labels = await this.labelsService.exportLabels(namespace);
    return labels.map((label) => this.mapToResponse(label));
  }

  @Get(':namespace/:key')
  @ApiOperation({ summary: 'Get a label with its variants' })
  @ApiOkResponse({ type: LabelResponseDto })
  @ApiNotFoundResponse({ description: 'Label not found' })
  async findOne(
    @Param('namespace') namespace: string,
    @Param('key') key: string,
  ): Promise<LabelResponseDto> {
    const label = await this.labelsService.findLabel({ namespace, key });
    return this.mapToResponse(label);
  }

  @Put(':namespace/:key/variants')
  @ApiOperation({ summary: 'Create or replace the variant at a tuple' })
  @ApiOkResponse({ type: LabelResponseDto })
  @ApiNotFoundResponse({ description: 'Label not found' })
  async saveVariant(
    @Param('namespace') namespace: string,
    @Param('key') key: string,
    @Body(ValidationPipe) dto: SaveVariantDto,
  ): Promise<LabelResponseDto> {
    const label = await this.labelsService.saveVariant(
      { namespace, key },
      toVariant(dto),
    );
    return this.mapToResponse(label);
  }

  @Get(':namespace/:key/usage')
  @ApiOperation({ summary: 'Render counts per locale/channel/modality' })
  @ApiOkResponse({ type: [UsageResponseDto] })
  @ApiNotFoundResponse({ description: 'Label not found' })
  async usage(
    @Param('namespace') namespace: string,
    @Param('key') key: string,
  ): Promise<UsageResponseDto[]> {
    return this.labelsService.findUsage({ namespace, key });
  }

  private mapToResponse(label: Label): LabelResponseDto {
    return {
      namespace: label.identifier.namespace,
      key: label.identifier.key,
      defaultLocale: label.defaultLocale,
      defaultText: label.defaultText,
      variants: label.variants.map((v) => ({
        locale: v.locale,
        connectorType: v.connectorType,
        interfaceType: v.interfaceType,
        alternatives: v.alternatives,
        validated: v.validated,
      })),
    };
  }
}
