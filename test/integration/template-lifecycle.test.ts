import { describe, it, expect, beforeEach } from 'vitest';
import { PostmarkApiProvider } from '../../src/providers/postmark-api.provider.js';
import { UnexpectedStatusError } from '../../src/errors/postmark.errors.js';
import { classifyError } from '../../src/services/error-classification.service.js';
import { createFakeHttpClient } from '../setup/fake-http-client.js';
import { FakePostmarkApi, ERROR_CODES, TEST_SERVER_TOKEN } from '../setup/fake-postmark-api.js';
import { captureError } from '../setup/capture-error.js';

const testTemplate = {
  name: 'Test Template',
  subject: 'Hello, {{name}}!',
  htmlBody: '<p>Hello, {{name}}!</p>',
  textBody: 'Hello, {{name}}!',
};

/**
 * Integration Tests - Template Lifecycle
 *
 * Full create -> get -> update -> list -> delete round against an
 * in-memory Postmark API.
 */
describe('Template lifecycle', () => {
  let api: FakePostmarkApi;
  let client: PostmarkApiProvider;

  beforeEach(() => {
    api = new FakePostmarkApi();
    const { httpClient } = createFakeHttpClient(api.handle);
    client = new PostmarkApiProvider(
      { serverToken: TEST_SERVER_TOKEN, baseUrl: 'https://api.postmark.test' },
      { httpClient }
    );
  });

  it('should create a template and read back the same fields', async () => {
    const id = await client.createTemplate(testTemplate);

    expect(id).toBe(1000);
    await expect(client.getTemplate(id)).resolves.toEqual({
      id: 1000,
      name: 'Test Template',
      subject: 'Hello, {{name}}!',
      htmlBody: '<p>Hello, {{name}}!</p>',
      textBody: 'Hello, {{name}}!',
      alias: undefined,
      active: true,
    });
  });

  it('should list a newly created template on the first page', async () => {
    const id = await client.createTemplate(testTemplate);

    const page = await client.listTemplates(0, 20);

    expect(id).toBeGreaterThan(0);
    expect(page.items).toContainEqual({
      id,
      name: 'Test Template',
      subject: 'Hello, {{name}}!',
      alias: undefined,
      active: true,
    });
  });

  it('should render the template through validation', async () => {
    const result = await client.validateTemplate({
      subject: testTemplate.subject,
      htmlBody: testTemplate.htmlBody,
      textBody: testTemplate.textBody,
      testRenderModel: { name: 'Ada' },
    });

    expect(result.allContentIsValid).toBe(true);
    expect(result.subject?.renderedContent).toBe('Hello, Ada!');
    expect(result.htmlBody?.renderedContent).toBe('<p>Hello, Ada!</p>');
    expect(result.suggestedTemplateModel).toEqual({ name: 'name_Value' });
  });

  it('should replace every field on update and stay stable when repeated', async () => {
    const id = await client.createTemplate(testTemplate);
    const replacement = {
      name: 'Renamed Template',
      subject: 'Welcome, {{name}}',
      htmlBody: '<h1>Welcome</h1>',
      textBody: 'Welcome',
      alias: 'welcome',
    };

    await client.updateTemplate(id, replacement);
    const first = await client.getTemplate(id);
    await client.updateTemplate(id, replacement);
    const second = await client.getTemplate(id);

    expect(first).toEqual({
      id,
      name: 'Renamed Template',
      subject: 'Welcome, {{name}}',
      htmlBody: '<h1>Welcome</h1>',
      textBody: 'Welcome',
      alias: 'welcome',
      active: true,
    });
    expect(second).toEqual(first);
  });

  it('should report a deleted template as not found', async () => {
    const id = await client.createTemplate(testTemplate);

    await client.deleteTemplate(id);
    const error = await captureError(client.getTemplate(id));

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    expect(error).toMatchObject({ status: 422, errorCode: ERROR_CODES.templateNotFound });
    expect(error instanceof UnexpectedStatusError && error.isNotFound).toBe(true);
    expect(api.templateCount).toBe(0);
  });

  it('should fail to delete a template twice', async () => {
    const id = await client.createTemplate(testTemplate);
    await client.deleteTemplate(id);

    const error = await captureError(client.deleteTemplate(id));

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    expect(error).toMatchObject({ status: 422, errorCode: ERROR_CODES.templateNotFound });
  });

  it('should fail to update a missing template', async () => {
    const error = await captureError(client.updateTemplate(4242, testTemplate));

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    expect(error instanceof UnexpectedStatusError && error.isNotFound).toBe(true);
  });

  it('should reject a template without a name', async () => {
    const error = await captureError(client.createTemplate({ ...testTemplate, name: '' }));

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    expect(error).toMatchObject({
      status: 422,
      errorCode: ERROR_CODES.templateFieldMissing,
      providerMessage: 'Name, Subject and a body are required.',
    });
    expect(classifyError(error).isRetryable).toBe(false);
  });

  it('should page through templates without gaps or duplicates', async () => {
    const created: number[] = [];
    for (let i = 0; i < 5; i++) {
      created.push(await client.createTemplate({ ...testTemplate, name: `Template ${i}` }));
    }

    const first = await client.listTemplates(0, 2);
    const second = await client.listTemplates(2, 2);
    const third = await client.listTemplates(4, 2);
    const past = await client.listTemplates(10, 2);

    expect(first.totalCount).toBe(5);
    const seen = [...first.items, ...second.items, ...third.items].map((template) => template.id);
    expect(seen).toEqual(created);
    expect(new Set(seen).size).toBe(5);
    expect(past).toEqual({ totalCount: 5, items: [] });
    await expect(client.listAllTemplates(2)).resolves.toHaveLength(5);
  });

  it('should refuse a client holding the wrong server token', async () => {
    const { httpClient } = createFakeHttpClient(api.handle);
    const intruder = new PostmarkApiProvider(
      { serverToken: 'wrong-token', baseUrl: 'https://api.postmark.test' },
      { httpClient }
    );

    const error = await captureError(intruder.listTemplates(0, 10));

    expect(error).toBeInstanceOf(UnexpectedStatusError);
    expect(error).toMatchObject({ status: 401, errorCode: ERROR_CODES.invalidToken });
    expect(classifyError(error)).toMatchObject({ isRetryable: false, category: 'client_error' });
  });
});
