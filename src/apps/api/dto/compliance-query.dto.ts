import { IsUrl } from 'class-validator';

export class ComplianceQueryDto {
  @IsUrl(
    { protocols: ['http', 'https'], require_protocol: true, require_tld: false },
    { message: 'url must be an http(s) URL' },
  )
  url!: string;
}
