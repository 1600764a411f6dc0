import type { FastifyInstance, FastifyRequest } from 'fastify';
import { parseDocument } from 'yaml';

/**
 * Replaces Fastify's JSON body parser with one that keeps the written key
 * order. Objects arrive as `Map`s, so integer-like keys are not moved to the
 * front the way plain objects would move them.
 *
 * The text is checked with `JSON.parse` first; a `SyntaxError` from there is
 * reported as invalid JSON by the error handler.
 */
export function registerOrderedJsonParser(fastify: FastifyInstance): void {
  fastify.removeContentTypeParser('application/json');
  fastify.addContentTypeParser(
    'application/json',
    { parseAs: 'string' },
    async (_request: FastifyRequest, body: string): Promise<unknown> => {
      JSON.parse(body);

      // Duplicate keys are legal JSON; the last value wins
      const doc = parseDocument(body, { uniqueKeys: false });
      const [firstError] = doc.errors;
      if (firstError !== undefined) {
        throw new SyntaxError(firstError.message);
      }
      return doc.toJS({ mapAsMap: true });
    }
  );
}
