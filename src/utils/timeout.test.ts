import { RunTimeoutError } from '../errors';
import { withTimeout } from './timeout';

describe('withTimeout', () => {
  it('resolves with the value when in time', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 50)).resolves.toBe('ok');
  });

  it('rejects with RunTimeoutError when the bound expires', async () => {
    const never = new Promise<string>(() => undefined);
    await expect(withTimeout(never, 10)).rejects.toThrow('Team run timed out after 10ms');
    await expect(withTimeout(never, 10)).rejects.toBeInstanceOf(RunTimeoutError);
  });

  it('passes rejections through', async () => {
    await expect(withTimeout(Promise.reject(new Error('failed')), 50)).rejects.toThrow('failed');
  });

  it('does not bound the promise when disabled', async () => {
    await expect(withTimeout(Promise.resolve(1), 0)).resolves.toBe(1);
  });
});
