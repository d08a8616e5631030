import { Injectable, PipeTransform } from '@nestjs/common';
import { UUID_PATTERN } from '../constants/discussion.constants';
import { RequestValidationError } from '../exceptions/discussion.exceptions';

@Injectable()
export class ParseAssetIdPipe implements PipeTransform<string, string> {
  transform(value: string): string {
    if (!UUID_PATTERN.test(value)) {
      throw new RequestValidationError(`Invalid asset identifier '${value}'`);
    }
    return value.toLowerCase();
  }
}
