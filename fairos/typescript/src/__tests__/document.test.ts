/**
 * Tests for the document service.
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { beforeEach, describe, expect, it } from 'vitest';
import { FairOSClient } from '../client';
import { FairOSErrorCode } from '../errors';
import { MockTransport, jsonResponse } from '../mocks';
import { Expr, Value } from '../query';
import type { Document } from '../services';
import { FairOSSimulator } from '../simulation';
import { BlockSize } from '../types';
import { rejectionOf, simulatedClient, userWithPod } from './helpers';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function numbers(docs: Document[]): unknown[] {
  return docs.map((doc) => doc['n']);
}

describe('DocumentService', () => {
  let client: FairOSClient;
  let simulator: FairOSSimulator;

  beforeEach(async () => {
    ({ client, simulator } = simulatedClient());
    await userWithPod(client, 'alice', 'docpod');
    await client.doc.createDatabase(
      'alice',
      'docpod',
      'people',
      [
        ['s', 'str'],
        ['n', 'number'],
      ],
      true
    );
    await client.doc.put('alice', 'docpod', 'people', { n: 8, s: 'a' });
    await client.doc.put('alice', 'docpod', 'people', { n: 10, s: 'a' });
    await client.doc.put('alice', 'docpod', 'people', { n: 12, s: 'b' });
  });

  describe('find', () => {
    it('filters on greater-than', async () => {
      const docs = await client.doc.find('alice', 'docpod', 'people', Expr.gt('n', Value.number(9)));
      expect(numbers(docs)).toEqual([10, 12]);
    });

    it('filters on equality', async () => {
      const docs = await client.doc.find('alice', 'docpod', 'people', Expr.eq('s', Value.str('a')));
      expect(numbers(docs)).toEqual([8, 10]);
    });

    it('filters on greater-or-equal', async () => {
      const docs = await client.doc.find('alice', 'docpod', 'people', Expr.gte('n', Value.number(10)));
      expect(numbers(docs)).toEqual([10, 12]);
    });

    it('matches everything with the empty expression', async () => {
      const docs = await client.doc.find('alice', 'docpod', 'people', Expr.all());
      expect(numbers(docs)).toEqual([8, 10, 12]);
    });

    it('honours the limit', async () => {
      const docs = await client.doc.find('alice', 'docpod', 'people', Expr.all(), 1);
      expect(numbers(docs)).toEqual([8]);
    });

    it('returns documents with their id', async () => {
      const [doc] = await client.doc.find('alice', 'docpod', 'people', Expr.eq('n', Value.number(12)));
      expect(doc).toMatchObject({ n: 12, s: 'b' });
      expect(String(doc?.['id'])).toMatch(UUID);
    });

    it('rejects fields without an index', async () => {
      const error = await rejectionOf(
        client.doc.find('alice', 'docpod', 'people', Expr.eq('age', Value.number(1)))
      );

      expect(error.is('document', 'error')).toBe(true);
      expect(error.details.remoteMessage).toBe('doc: index not found');
    });

    it('sends the compiled expression verbatim', async () => {
      await client.doc.find('alice', 'docpod', 'people', Expr.eq('s', Value.str('a')), 5);

      const [last] = simulator.getCalls().slice(-1);
      expect(last?.query).toBe('pod_name=docpod&table_name=people&expr=s=%22a%22&limit=5');
    });

    it('refuses unsupported expressions before calling out', async () => {
      const before = simulator.getCalls().length;
      const expr = Expr.and(Expr.eq('s', Value.str('a')), Expr.gt('n', Value.number(9)));

      const error = await rejectionOf(client.doc.find('alice', 'docpod', 'people', expr));

      expect(error.code).toBe(FairOSErrorCode.UnsupportedExpression);
      expect(simulator.getCalls()).toHaveLength(before);
    });
  });

  describe('count', () => {
    it('counts matching documents', async () => {
      await expect(
        client.doc.count('alice', 'docpod', 'people', Expr.gt('n', Value.number(9)))
      ).resolves.toBe(2);
      await expect(client.doc.count('alice', 'docpod', 'people', Expr.all())).resolves.toBe(3);
    });

    it('fails to decode a count that is not a number', async () => {
      const transport = new MockTransport(jsonResponse({ message: 'lots', code: 200 }));
      const mocked = FairOSClient.builder().transport(transport).build();
      mocked.getSessions().set('alice', 'tok');

      const error = await rejectionOf(mocked.doc.count('alice', 'docpod', 'people', Expr.all()));

      expect(error.code).toBe(FairOSErrorCode.DecodeFailed);
      expect(error.message).toBe('Response from /doc/count is not a count: "lots"');
    });
  });

  describe('entries', () => {
    it('stores under a fresh id and reads it back', async () => {
      const id = await client.doc.put('alice', 'docpod', 'people', { id: 'mine', n: 1, s: 'z' });

      expect(id).toMatch(UUID);
      await expect(client.doc.get('alice', 'docpod', 'people', id)).resolves.toEqual({
        id,
        n: 1,
        s: 'z',
      });
    });

    it('deletes documents', async () => {
      const id = await client.doc.put('alice', 'docpod', 'people', { n: 1, s: 'z' });

      await client.doc.delete('alice', 'docpod', 'people', id);

      const error = await rejectionOf(client.doc.get('alice', 'docpod', 'people', id));
      expect(error.is('document')).toBe(true);
      expect(error.details.statusCode).toBe(404);
    });
  });

  describe('databases', () => {
    it('lists databases with sorted fields including the id index', async () => {
      await client.doc.createDatabase('alice', 'docpod', 'archive', [['title', 'str']], false);

      await expect(client.doc.listDatabases('alice', 'docpod')).resolves.toEqual([
        { name: 'archive', fields: [['id', 'str'], ['title', 'str']] },
        {
          name: 'people',
          fields: [
            ['id', 'str'],
            ['n', 'number'],
            ['s', 'str'],
          ],
        },
      ]);
    });

    it('creates databases with map fields', async () => {
      await client.doc.createDatabase('alice', 'docpod', 'things', [['meta', 'map']], false);

      const [call] = simulator.getCalls().slice(-1);
      expect(call?.path).toBe('/doc/new');
      await expect(client.doc.listDatabases('alice', 'docpod')).resolves.toContainEqual({
        name: 'things',
        fields: [
          ['id', 'str'],
          ['meta', 'map'],
        ],
      });
    });

    it('opens and deletes databases', async () => {
      await client.doc.openDatabase('alice', 'docpod', 'people');
      await client.doc.deleteDatabase('alice', 'docpod', 'people');

      const error = await rejectionOf(client.doc.openDatabase('alice', 'docpod', 'people'));
      expect(error.details.remoteMessage).toBe('doc: table does not exist');
    });

    it('rejects unknown field type codes', async () => {
      const transport = new MockTransport(
        jsonResponse({ Tables: [{ table_name: 't', indexes: [{ name: 'x', type: 9 }] }] })
      );
      const mocked = FairOSClient.builder().transport(transport).build();
      mocked.getSessions().set('alice', 'tok');

      const error = await rejectionOf(mocked.doc.listDatabases('alice', 'docpod'));

      expect(error.code).toBe(FairOSErrorCode.DecodeFailed);
      expect(error.message).toBe('Unknown field type code: 9');
    });
  });

  describe('loading JSON', () => {
    it('loads one document per line', async () => {
      await client.doc.loadJsonBuffer(
        'alice',
        'docpod',
        'people',
        '{"n":20,"s":"c"}\n{"n":21,"s":"c"}\n'
      );

      await expect(
        client.doc.count('alice', 'docpod', 'people', Expr.eq('s', Value.str('c')))
      ).resolves.toBe(2);
    });

    it('loads documents from a local file', async () => {
      const dir = await mkdtemp(path.join(os.tmpdir(), 'fairos-doc-'));
      const file = path.join(dir, 'rows.json');
      await writeFile(file, '{"n":40,"s":"e"}\n');

      try {
        await client.doc.loadJsonFile('alice', 'docpod', 'people', file);
      } finally {
        await rm(dir, { recursive: true, force: true });
      }

      const docs = await client.doc.find('alice', 'docpod', 'people', Expr.eq('s', Value.str('e')));
      expect(numbers(docs)).toEqual([40]);
    });

    it('indexes a JSON file stored in the pod', async () => {
      await client.fs.uploadBuffer('alice', 'docpod', '/', 'rows.json', '{"n":30,"s":"d"}\n', {
        blockSize: BlockSize.kilobytes(1),
      });

      await client.doc.indexJson('alice', 'docpod', 'people', '/rows.json');

      const docs = await client.doc.find('alice', 'docpod', 'people', Expr.eq('s', Value.str('d')));
      expect(numbers(docs)).toEqual([30]);
    });
  });

  describe('request shape', () => {
    function mockedClient(): { mocked: FairOSClient; transport: MockTransport } {
      const transport = new MockTransport();
      transport.onPath('/doc/find', jsonResponse({ docs: null }));
      const mocked = FairOSClient.builder().transport(transport).build();
      mocked.getSessions().set('alice', 'tok');
      return { mocked, transport };
    }

    it('writes less-than with the operands swapped', async () => {
      const { mocked, transport } = mockedClient();

      await expect(
        mocked.doc.find('alice', 'docpod', 'people', Expr.lt('n', Value.number(11)), 3)
      ).resolves.toEqual([]);
      expect(transport.lastRequest().query).toBe(
        'pod_name=docpod&table_name=people&expr=11%3en&limit=3'
      );
    });

    it('validates the limit before calling out', async () => {
      const { mocked, transport } = mockedClient();

      const error = await rejectionOf(mocked.doc.find('alice', 'docpod', 'people', Expr.all(), -1));

      expect(error.code).toBe(FairOSErrorCode.Validation);
      expect(transport.getRecordedRequests()).toEqual([]);
    });
  });

  it('needs a session', async () => {
    await client.user.logout('alice');

    const error = await rejectionOf(client.doc.find('alice', 'docpod', 'people', Expr.all()));

    expect(error.code).toBe(FairOSErrorCode.NotLoggedIn);
  });
});
