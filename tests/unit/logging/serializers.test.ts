import { describe, it, expect } from 'vitest';
import { errorSerializer } from '@/logging/serializers.js';
import { LogIOError } from '@/errors.js';

describe('errorSerializer', () => {
  it('should capture type, message and stack', () => {
    const error = new TypeError('not a function');

    const serialized = errorSerializer(error);

    expect(serialized).toMatchObject({ type: 'TypeError', message: 'not a function' });
    expect(serialized).toHaveProperty('stack', error.stack);
  });

  it('should keep custom properties', () => {
    const serialized = errorSerializer(new LogIOError('cannot open', '/var/log/app.log'));

    expect(serialized).toMatchObject({
      type: 'LogIOError',
      message: 'cannot open',
      code: 'IO_ERROR',
      path: '/var/log/app.log',
    });
  });

  it('should pass other values through', () => {
    expect(errorSerializer('plain')).toBe('plain');
    expect(errorSerializer({ message: 'not an error' })).toEqual({ message: 'not an error' });
    expect(errorSerializer(undefined)).toBeUndefined();
  });
});
