import { ValidationError } from '../core/errors/AppError';
import { locationUpdateSchema } from '../modules/delivery/delivery.schema';
import { updateStatusSchema } from '../modules/package/package.schema';
import { idParamSchema, validateSchema } from '../shared/utils/validation.utils';

describe('validateSchema', () => {
  it('coerces numeric route ids', () => {
    expect(validateSchema(idParamSchema, { id: '42' })).toEqual({ id: 42 });
  });

  it('throws a ValidationError listing each failing field', () => {
    let caught: unknown;
    try {
      validateSchema(locationUpdateSchema, { lat: 91, lng: 'east' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.statusCode).toBe(400);
      expect(caught.errors.map(detail => detail.field)).toEqual(['lat', 'lng']);
    }
  });

  it('rejects non-positive ids', () => {
    expect(() => validateSchema(idParamSchema, { id: '0' })).toThrow(ValidationError);
  });

  it('keeps assignment out of plain status updates', () => {
    expect(() => validateSchema(updateStatusSchema, { status: 'assigned' })).toThrow(ValidationError);
    expect(validateSchema(updateStatusSchema, { status: 'picked_up' })).toEqual({ status: 'picked_up' });
  });
});
