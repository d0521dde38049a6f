import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { RENDER_MODES, RenderMode } from '@/shared/scraping/enums/render-mode.enum';

const HTTP_URL = {
  protocols: ['http', 'https'],
  require_protocol: true,
  require_tld: false,
};

export class CreateExtractionJobDto {
  @IsUrl(HTTP_URL, { message: 'url must be an http(s) URL' })
  url!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  instruction!: string;

  // Unknown formats are rejected by the job manager with EXPORT_UNSUPPORTED
  @IsOptional()
  @IsString()
  format?: string;

  @IsOptional()
  @IsUrl(HTTP_URL, { message: 'webhookUrl must be an http(s) URL' })
  webhookUrl?: string;

  /** Fetch timeout in seconds. */
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(120)
  timeout?: number;

  @IsOptional()
  @IsIn(RENDER_MODES)
  renderMode?: RenderMode;

  @IsOptional()
  @IsBoolean()
  structuredExtraction?: boolean;

  @IsOptional()
  @IsBoolean()
  strictSchema?: boolean;

  @IsOptional()
  @IsBoolean()
  antiDetection?: boolean;

  @IsOptional()
  @IsBoolean()
  checkCompliance?: boolean;
}
