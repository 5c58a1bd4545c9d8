import { beforeEach, describe, expect, it } from 'vitest';
import { NotFoundError, ValidationError } from '../src/lib/errors.js';
import { LanguageTranslation } from '../src/lib/language-translation.js';
import type { CreateModelOptions, TranslationModel } from '../src/lib/language-translation-types.js';
import {
  credentials,
  emptyResponse,
  type FetchMock,
  formBody,
  jsonResponse,
  rejectionOf,
  requestAt,
  stubFetch,
} from './service-fixtures.js';

const file = (filename: string, contents: string) => ({ filename, data: new TextEncoder().encode(contents) });

describe('LanguageTranslation models', () => {
  let mockFetch: FetchMock;
  let service: LanguageTranslation;

  beforeEach(() => {
    mockFetch = stubFetch();
    service = new LanguageTranslation(credentials);
  });

  describe('createModel', () => {
    it('rejects a missing or empty base model id without calling the service', () => {
      expect(() => service.createModel({ baseModelId: '' })).toThrow(ValidationError);
      expect(() => service.createModel({ baseModelId: '' })).toThrow('options.baseModelId cannot be null or empty');
      expect(() => service.createModel(undefined as unknown as CreateModelOptions)).toThrow(
        'options cannot be null',
      );
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('posts base model id and name as query parameters', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ model_id: 'custom-1', base_model_id: 'en-es' }));

      await service.createModel({ baseModelId: 'en-es', name: 'news' }).execute();

      const request = requestAt(mockFetch);
      expect(request.method).toBe('POST');
      expect(request.url.pathname).toBe('/language-translation/api/v2/models');
      expect(request.url.searchParams.get('base_model_id')).toBe('en-es');
      expect(request.url.searchParams.get('name')).toBe('news');
    });

    it('omits the name when not given', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ model_id: 'custom-1' }));

      await service.createModel({ baseModelId: 'en-es' }).execute();

      expect(requestAt(mockFetch).url.searchParams.has('name')).toBe(false);
    });

    it('uploads exactly the files supplied', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ model_id: 'custom-1' }));

      await service
        .createModel({
          baseModelId: 'en-es',
          forcedGlossary: file('glossary.tmx', '<tmx>glossary</tmx>'),
          parallelCorpus: file('parallel.tmx', '<tmx>parallel</tmx>'),
        })
        .execute();

      const request = requestAt(mockFetch);
      const form = formBody(request);
      expect(form.has('forced_glossary')).toBe(true);
      expect(form.has('monolingual_corpus')).toBe(false);
      expect(form.has('parallel_corpus')).toBe(true);

      const glossary = form.get('forced_glossary');
      if (glossary === null || typeof glossary === 'string') {
        throw new Error('expected a file part');
      }
      expect(glossary.name).toBe('glossary.tmx');
      expect(await glossary.text()).toBe('<tmx>glossary</tmx>');
      // fetch generates the multipart boundary
      expect(request.headers.has('content-type')).toBe(false);
    });

    it('sends an empty form when no files are supplied', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ model_id: 'custom-1' }));

      await service.createModel({ baseModelId: 'en-es' }).execute();

      expect(Array.from(formBody(requestAt(mockFetch)).keys())).toEqual([]);
    });

    it('maps the created model', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({
          model_id: 'custom-1',
          name: 'news',
          source: 'en',
          target: 'es',
          base_model_id: 'en-es',
          domain: 'news',
          customizable: false,
          default_model: false,
          owner: 'owner-1',
          status: 'training',
        }),
      );

      const model = await service
        .createModel({ baseModelId: 'en-es', monolingualCorpus: file('corpus.txt', 'hola') })
        .execute();

      expect(model).toEqual<TranslationModel>({
        modelId: 'custom-1',
        name: 'news',
        source: 'en',
        target: 'es',
        baseModelId: 'en-es',
        domain: 'news',
        customizable: false,
        defaultModel: false,
        owner: 'owner-1',
        status: 'training',
      });
    });
  });

  describe('getModel', () => {
    it('rejects an empty id without calling the service', () => {
      expect(() => service.getModel('')).toThrow('modelId cannot be null or empty');
      expect(() => service.getModel(null as unknown as string)).toThrow('modelId cannot be null or empty');
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('fetches one model by id', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ model_id: 'en-es', source: 'en', target: 'es', name: null }));

      const model = await service.getModel('en-es').execute();

      expect(requestAt(mockFetch).method).toBe('GET');
      expect(requestAt(mockFetch).url.pathname).toBe('/language-translation/api/v2/models/en-es');
      expect(model).toEqual({ modelId: 'en-es', source: 'en', target: 'es' });
    });

    it('encodes the id into the path', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ model_id: 'a/b' }));

      await service.getModel('a/b').execute();

      expect(requestAt(mockFetch).url.pathname).toBe('/language-translation/api/v2/models/a%2Fb');
    });
  });

  describe('getModels', () => {
    it('encodes default, source and target filters independently', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ models: [] }));

      await service.getModels(true, 'en', 'es').execute();

      const params = requestAt(mockFetch).url.searchParams;
      expect(params.get('default')).toBe('true');
      expect(params.get('source')).toBe('en');
      expect(params.get('target')).toBe('es');
    });

    it('sends a target filter without a source filter', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ models: [] }));

      await service.getModels(undefined, undefined, 'es').execute();

      const params = requestAt(mockFetch).url.searchParams;
      expect(params.get('target')).toBe('es');
      expect(params.has('source')).toBe(false);
      expect(params.has('default')).toBe(false);
    });

    it('leaves empty filters off the query', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ models: [] }));

      await service.getModels(false, '', '').execute();

      expect(requestAt(mockFetch).url.search).toBe('?default=false');
    });

    it('accepts an options object', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ models: [] }));

      await service.getModels({ source: 'fr' }).execute();

      expect(requestAt(mockFetch).url.search).toBe('?source=fr');
    });

    it('lists models from the models envelope', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({
          models: [
            { model_id: 'en-es', source: 'en', target: 'es', default_model: true, status: 'available' },
            { model_id: 'custom-1', base_model_id: 'en-es', default_model: false },
          ],
        }),
      );

      const models = await service.getModels().execute();

      expect(requestAt(mockFetch).url.search).toBe('');
      expect(models).toEqual([
        { modelId: 'en-es', source: 'en', target: 'es', defaultModel: true, status: 'available' },
        { modelId: 'custom-1', baseModelId: 'en-es', defaultModel: false },
      ]);
    });

    it('delivers models through enqueue', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ models: [{ model_id: 'en-fr' }] }));

      const models = await new Promise<TranslationModel[]>((resolve, reject) => {
        service.getModels().enqueue({ onResponse: resolve, onFailure: reject });
      });

      expect(models).toEqual([{ modelId: 'en-fr' }]);
    });
  });

  describe('deleteModel', () => {
    it('rejects an empty id without calling the service', () => {
      expect(() => service.deleteModel('')).toThrow(ValidationError);
      expect(() => service.deleteModel(null as unknown as string)).toThrow('modelId cannot be null or empty');
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('resolves with no value on success', async () => {
      mockFetch.mockResolvedValueOnce(emptyResponse(200));

      await expect(service.deleteModel('custom-1').execute()).resolves.toBeUndefined();

      const request = requestAt(mockFetch);
      expect(request.method).toBe('DELETE');
      expect(request.url.pathname).toBe('/language-translation/api/v2/models/custom-1');
    });

    it('raises NotFoundError with status 404 for an unknown model', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ error: 'Model not found', code: 404 }, 404));

      const error = await rejectionOf(service.deleteModel('bad-id').execute());

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toHaveProperty('status', 404);
      expect(error).toHaveProperty('message', 'Model not found');
    });

    it('reports a 404 through the enqueue failure callback', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ error: 'Model not found' }, 404));

      const error = await new Promise<Error>((resolve) => {
        service.deleteModel('bad-id').enqueue({
          onResponse: () => resolve(new Error('unexpected success')),
          onFailure: resolve,
        });
      });

      expect(error).toBeInstanceOf(NotFoundError);
    });
  });
});
