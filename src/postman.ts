import { z } from 'zod';
import { parseTestDefinition } from './definition';
import { ValidationError, errorMessage } from './errors';
import type { JsonValue, TestDefinition } from './types';

const keyValue = z.object({
  key: z.string().optional(),
  value: z.string().nullable().optional(),
  disabled: z.boolean().optional(),
});

const postmanUrl = z.union([
  z.string(),
  z.object({
    raw: z.string().optional(),
    protocol: z.string().optional(),
    host: z.union([z.string(), z.array(z.string())]).optional(),
    path: z.union([z.string(), z.array(z.string())]).optional(),
    query: z.array(keyValue).optional(),
  }),
]);

const postmanRequest = z.union([
  z.string(),
  z.object({
    method: z.string().optional(),
    header: z.array(keyValue).optional(),
    body: z
      .object({
        mode: z.string().optional(),
        raw: z.string().optional(),
        formdata: z.array(keyValue).optional(),
        urlencoded: z.array(keyValue).optional(),
      })
      .optional(),
    url: postmanUrl.optional(),
  }),
]);

interface PostmanItem {
  name?: string;
  request?: z.infer<typeof postmanRequest>;
  item?: PostmanItem[];
}

const postmanItem: z.ZodType<PostmanItem> = z.lazy(() =>
  z.object({
    name: z.string().optional(),
    request: postmanRequest.optional(),
    item: z.array(postmanItem).optional(),
  })
);

const postmanCollection = z.object({
  info: z.object({ name: z.string().optional(), schema: z.string().optional() }),
  item: z.array(postmanItem),
  variable: z.array(keyValue).optional(),
});

export type PostmanCollection = z.infer<typeof postmanCollection>;

export function isPostmanCollection(data: unknown): boolean {
  return postmanCollection.safeParse(data).success;
}

type Substitute = (text: string) => string;

function buildUrl(url: z.infer<typeof postmanUrl> | undefined, substitute: Substitute): string {
  if (url === undefined) return '';
  if (typeof url === 'string') return substitute(url.trim());
  if (url.raw) return substitute(url.raw.trim());

  const protocol = url.protocol || 'https';
  const host = Array.isArray(url.host) ? url.host.filter(Boolean).join('.') : url.host || '';
  const path = Array.isArray(url.path) ? `/${url.path.filter(Boolean).join('/')}` : url.path || '';
  const params = (url.query || [])
    .filter((q) => q.key && !q.disabled)
    .map((q) => `${q.key}=${q.value ?? ''}`);
  const query = params.length > 0 ? `?${params.join('&')}` : '';
  return substitute(`${protocol}://${host}${path}${query}`);
}

function buildBody(
  body: { mode?: string; raw?: string; formdata?: z.infer<typeof keyValue>[]; urlencoded?: z.infer<typeof keyValue>[] } | undefined,
  substitute: Substitute
): JsonValue | undefined {
  if (!body) return undefined;
  if (body.mode === 'raw' && body.raw) {
    const raw = substitute(body.raw);
    try {
      return JSON.parse(raw);
    } catch {
      return raw;
    }
  }
  const fields = body.mode === 'formdata' ? body.formdata : body.mode === 'urlencoded' ? body.urlencoded : undefined;
  if (!fields) return undefined;
  const form: Record<string, string> = {};
  fields.forEach((field) => {
    if (field.key && !field.disabled) {
      form[field.key] = substitute(field.value ?? '');
    }
  });
  return form;
}

/**
 * Flatten a Postman v2 collection into test definitions. Folder paths become
 * suite names; `{{variable}}` references are filled from the collection.
 * Requests that cannot be turned into a test are reported through `skipped`.
 */
export function fromPostmanCollection(data: unknown): { tests: TestDefinition[]; skipped: string[] } {
  const parsed = postmanCollection.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError('Not a Postman collection', parsed.error.errors.map((e) => e.message));
  }
  const collection = parsed.data;
  const collectionName = collection.info.name || 'postman-collection';

  const variables = new Map<string, string>();
  (collection.variable || []).forEach((v) => {
    if (v.key) variables.set(v.key, v.value ?? '');
  });
  const substitute: Substitute = (text) =>
    text.replace(/\{\{\s*([\w.-]+)\s*\}\}/g, (match, name: string) => variables.get(name) ?? match);

  const tests: TestDefinition[] = [];
  const skipped: string[] = [];

  const processItems = (items: PostmanItem[], folderPath: string) => {
    items.forEach((item) => {
      if (item.item) {
        const folder = item.name || 'folder';
        processItems(item.item, folderPath ? `${folderPath}/${folder}` : folder);
        return;
      }
      if (item.request === undefined) return;

      const request = typeof item.request === 'string' ? { url: item.request } : item.request;
      const name = item.name || `Postman Request ${tests.length + skipped.length + 1}`;
      const headers: Record<string, string> = {};
      (('header' in request && request.header) || []).forEach((h) => {
        if (h.key && !h.disabled) headers[h.key] = substitute(h.value ?? '');
      });

      try {
        tests.push(
          parseTestDefinition(
            {
              name,
              method: ('method' in request && request.method) || 'GET',
              url: buildUrl(request.url, substitute),
              headers,
              body: buildBody('body' in request ? request.body : undefined, substitute),
              description: `Imported from Postman: ${name}`,
              tags: ['postman', 'imported'],
              suiteName: folderPath || collectionName,
              assertions: [{ type: 'status_code', expected: 200 }],
            },
            tests.length
          )
        );
      } catch (error) {
        skipped.push(`${name}: ${errorMessage(error)}`);
      }
    });
  };

  processItems(collection.item, '');
  return { tests, skipped };
}
