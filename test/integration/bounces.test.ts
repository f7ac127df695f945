import { describe, it, expect, beforeEach } from 'vitest';
import { PostmarkApiProvider } from '../../src/providers/postmark-api.provider.js';
import { UnexpectedStatusError } from '../../src/errors/postmark.errors.js';
import { createFakeHttpClient } from '../setup/fake-http-client.js';
import { FakePostmarkApi, ERROR_CODES, TEST_SERVER_TOKEN } from '../setup/fake-postmark-api.js';
import { makeWireBounce } from '../setup/bounce-fixtures.js';
import { captureError } from '../setup/capture-error.js';

/**
 * Integration Tests - Bounces
 */
describe('Bounces', () => {
  let client: PostmarkApiProvider;

  beforeEach(() => {
    const api = new FakePostmarkApi({
      bounces: [
        makeWireBounce({ ID: 1, Email: 'first@example.com' }),
        makeWireBounce({ ID: 2, Type: 'SoftBounce', TypeCode: 4096, Inactive: false }),
        makeWireBounce({ ID: 3, Email: 'third@example.com', CanActivate: false }),
      ],
    });
    const { httpClient } = createFakeHttpClient(api.handle);
    client = new PostmarkApiProvider(
      { serverToken: TEST_SERVER_TOKEN, baseUrl: 'https://api.postmark.test' },
      { httpClient }
    );
  });

  it('should list bounces a page at a time', async () => {
    const first = await client.listBounces(0, 2);
    const second = await client.listBounces(2, 2);

    expect(first.totalCount).toBe(3);
    expect(first.items.map((bounce) => bounce.id)).toEqual([1, 2]);
    expect(second.items.map((bounce) => bounce.id)).toEqual([3]);
  });

  it('should filter by type and inactive flag', async () => {
    const hard = await client.listBounces(0, 10, { type: 'HardBounce' });
    const active = await client.listBounces(0, 10, { inactive: false });

    expect(hard.totalCount).toBe(2);
    expect(hard.items.map((bounce) => bounce.id)).toEqual([1, 3]);
    expect(active.items.map((bounce) => bounce.type)).toEqual(['SoftBounce']);
  });

  it('should fetch one bounce by id', async () => {
    const bounce = await client.getBounce(3);

    expect(bounce).toMatchObject({ id: 3, email: 'third@example.com', canActivate: false });
  });

  it('should report a missing bounce as not found', async () => {
    const error = await captureError(client.getBounce(404404));

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    expect(error).toMatchObject({ status: 422, errorCode: ERROR_CODES.bounceNotFound });
    expect(error instanceof UnexpectedStatusError && error.isNotFound).toBe(true);
  });

  it('should reactivate a bounced address', async () => {
    const activated = await client.activateBounce(1);
    const reread = await client.getBounce(1);

    expect(activated.inactive).toBe(false);
    expect(reread.inactive).toBe(false);
  });

  it('should refuse to reactivate a bounce that cannot be activated', async () => {
    const error = await captureError(client.activateBounce(3));

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    expect(error).toMatchObject({ status: 422, errorCode: ERROR_CODES.bounceCannotActivate });
  });
});
