import type { PipeTransform, ArgumentMetadata } from '@nestjs/common';
import { Injectable } from '@nestjs/common';
import type { ZodTypeAny, output } from 'zod';
import { InvalidInputError } from '../errors/game-errors.js';

/** 요청 본문 검증: 실패 시 422 INVALID_INPUT (issues 에 경로별 메시지) */
@Injectable()
export class ZodValidationPipe<T extends ZodTypeAny> implements PipeTransform<unknown, output<T>> {
  constructor(private readonly schema: T) {}

  transform(value: unknown, metadata: ArgumentMetadata): output<T> {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      const issues = result.error.issues.map(
        (i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`,
      );
      throw new InvalidInputError(`Validation failed for ${metadata.type}`, { issues });
    }
    return result.data;
  }
}
