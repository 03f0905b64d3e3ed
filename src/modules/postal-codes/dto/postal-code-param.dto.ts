import { ApiProperty } from '@nestjs/swagger';
import { Matches } from 'class-validator';

export class PostalCodeParamDto {
  @ApiProperty({
    description: 'Polish postal code, with or without the dash',
    example: '53-332',
    pattern: '^(\\d{2}-\\d{3}|\\d{5})$',
  })
  @Matches(/^(\d{2}-\d{3}|\d{5})$/, {
    message: 'postalCode must be in XX-XXX or XXXXX format',
  })
  postalCode!: string;
}
