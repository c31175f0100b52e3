import { z } from 'zod';
import { InvalidInputError } from '../errors/game-errors.js';
import { ZodValidationPipe } from './zod-validation.pipe.js';

describe('ZodValidationPipe', () => {
  const pipe = new ZodValidationPipe(
    z.object({ unitId: z.string(), round: z.number().default(1) }),
  );

  it('검증 통과 시 기본값이 채워진 값을 반환', () => {
    expect(pipe.transform({ unitId: 'u1' }, { type: 'body' })).toEqual({
      unitId: 'u1',
      round: 1,
    });
  });

  it('누락 필드는 경로별 issue 와 함께 INVALID_INPUT', () => {
    let caught: unknown;
    try {
      pipe.transform({}, { type: 'body' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidInputError);
    if (!(caught instanceof InvalidInputError)) return;
    expect(caught.message).toBe('Validation failed for body');
    expect(caught.httpStatus).toBe(422);
    expect(caught.details).toEqual({ issues: ['unitId: Required'] });
  });

  it('객체가 아닌 본문은 거부', () => {
    expect(() => pipe.transform('x', { type: 'body' })).toThrow(InvalidInputError);
  });
});
