import {
  PipeTransform,
  Injectable,
  ArgumentMetadata,
  Logger,
  Type,
} from '@nestjs/common';
import { validate } from 'class-validator';
import { plainToInstance } from 'class-transformer';
import { RequestValidationError } from '../exceptions/discussion.exceptions';

/**
 * Validates DTO bodies and reports the first failing constraint, in the
 * order the DTO declares its properties.
 */
@Injectable()
export class CustomValidationPipe implements PipeTransform<unknown> {
  private readonly logger = new Logger(CustomValidationPipe.name);

  async transform(value: unknown, { metatype }: ArgumentMetadata) {
    if (!metatype || !this.toValidate(metatype)) {
      return value;
    }

    const object: object = plainToInstance(metatype, value ?? {});
    const errors = await validate(object);

    if (errors.length > 0) {
      const [first] = errors;
      const messages = Object.values(first.constraints ?? {});
      const message = messages[0] ?? `Invalid value for ${first.property}`;

      this.logger.warn(
        `Validation failed on ${metatype.name}.${first.property}: ${message}`,
      );
      throw new RequestValidationError(message);
    }

    return object;
  }

  private toValidate(metatype: Type<unknown>): boolean {
    const types: Type<unknown>[] = [String, Boolean, Number, Array, Object];
    return !types.includes(metatype);
  }
}
