import { validateSync } from 'class-validator';
import { ValidationException } from '../exceptions/base.exception';

// 요청 본문을 DTO 인스턴스로 옮긴 뒤 class-validator로 검증
export function validateDto<T extends object>(
  dtoClass: new () => T,
  payload: unknown,
): T {
  const dto = new dtoClass();
  if (typeof payload === 'object' && payload !== null) {
    Object.assign(dto, payload);
  } else if (payload !== undefined && payload !== null) {
    throw new ValidationException('Request body must be an object', {
      received: typeof payload,
    });
  }

  const errors = validateSync(dto, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });
  if (errors.length > 0) {
    throw new ValidationException(
      `Invalid ${dtoClass.name}`,
      errors.map((error) => ({
        property: error.property,
        constraints: error.constraints,
      })),
    );
  }

  return dto;
}
