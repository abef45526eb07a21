import { AnalysisError, AnalysisValidationError } from '@libs/exceptions';

import { brandAnalysisFixture } from '../../../test/fixtures/brand-analysis.fixture';
import {
  buildAnalysisContents,
  parseAnalysisPayload,
  toAnalysisError,
  validateBrandAnalysis,
} from './analysis-payload.utils';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('buildAnalysisContents', () => {
  it('sends the instruction and the video reference in one user turn', () => {
    expect(
      buildAnalysisContents('Analyze this', 'gs://bucket/uploads/a.mp4'),
    ).toEqual([
      {
        role: 'user',
        parts: [
          { text: 'Analyze this' },
          {
            fileData: {
              mimeType: 'video/mp4',
              fileUri: 'gs://bucket/uploads/a.mp4',
            },
          },
        ],
      },
    ]);
  });
});

describe('parseAnalysisPayload', () => {
  it('passes structured objects through', () => {
    const payload = { estilo_conteudo: 'humorous' };
    expect(parseAnalysisPayload(payload)).toBe(payload);
  });

  it('parses JSON text', () => {
    expect(
      parseAnalysisPayload('{"estilo_conteudo":"humorous","temas_abordados":[]}'),
    ).toEqual({ estilo_conteudo: 'humorous', temas_abordados: [] });
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseAnalysisPayload('I could not watch the video')).toThrow(
      new AnalysisError('Failed to parse JSON response', 'parse'),
    );
  });

  it('rejects a JSON array', () => {
    expect(() => parseAnalysisPayload('["comedy"]')).toThrow(AnalysisError);
  });

  it.each([[null], [42], [undefined], [['comedy']]])(
    'rejects %p',
    (payload) => {
      const error = thrownBy(() => parseAnalysisPayload(payload));

      expect(error).toBeInstanceOf(AnalysisError);
      expect(error).toMatchObject({ reason: 'parse' });
    },
  );
});

describe('validateBrandAnalysis', () => {
  it('accepts a complete analysis', async () => {
    const fixture = brandAnalysisFixture();
    await expect(validateBrandAnalysis({ ...fixture })).resolves.toEqual(fixture);
  });

  it('drops keys the schema does not define', async () => {
    const result = await validateBrandAnalysis({
      ...brandAnalysisFixture(),
      confidence: 0.9,
    });

    expect(result).not.toHaveProperty('confidence');
  });

  it('reports a missing top-level field', async () => {
    const { engajamento, ...rest } = brandAnalysisFixture();
    expect(engajamento).toBeDefined();

    const attempt = validateBrandAnalysis(rest);

    await expect(attempt).rejects.toBeInstanceOf(AnalysisValidationError);
    await expect(attempt).rejects.toMatchObject({
      reason: 'validation',
      issues: ['engajamento: engajamento must be a string'],
    });
  });

  it('reports nested paths', async () => {
    const fixture = brandAnalysisFixture();
    const plain = {
      ...fixture,
      publico_alvo_estimado: { ...fixture.publico_alvo_estimado, genero: 5 },
      marcas_match: [
        { tipo_marca: 'Snack brands', exemplos: ['Crunchy Co'] },
      ],
    };

    await expect(validateBrandAnalysis(plain)).rejects.toMatchObject({
      issues: [
        'publico_alvo_estimado.genero: genero must be a string',
        'marcas_match.0.justificativa: justificativa must be a string',
      ],
    });
  });

  it('reports a missing nested object', async () => {
    const { publico_alvo_estimado, ...rest } = brandAnalysisFixture();
    expect(publico_alvo_estimado).toBeDefined();

    const error = await validateBrandAnalysis(rest).then(
      () => undefined,
      (reason: unknown) => reason,
    );

    expect(error).toBeInstanceOf(AnalysisValidationError);
    const issues = error instanceof AnalysisValidationError ? error.issues : [];
    expect(
      issues.some((issue) => issue.startsWith('publico_alvo_estimado:')),
    ).toBe(true);
  });
});

describe('toAnalysisError', () => {
  it('keeps AnalysisError instances', () => {
    const original = new AnalysisError('boom', 'parse');
    expect(toAnalysisError(original)).toBe(original);
  });

  it('classifies HTTP 429 as a quota failure', () => {
    const error = toAnalysisError(
      Object.assign(new Error('Too many requests'), { status: 429 }),
    );

    expect(error.reason).toBe('quota');
    expect(error.message).toBe(
      'Error analyzing brand compatibility: Too many requests',
    );
  });

  it('classifies RESOURCE_EXHAUSTED as a quota failure', () => {
    expect(
      toAnalysisError(new Error('8 RESOURCE_EXHAUSTED: try later')).reason,
    ).toBe('quota');
  });

  it('classifies permission errors', () => {
    expect(
      toAnalysisError(Object.assign(new Error('Forbidden'), { status: 403 }))
        .reason,
    ).toBe('permission');
    expect(
      toAnalysisError(new Error('PERMISSION_DENIED on aiplatform')).reason,
    ).toBe('permission');
  });

  it('classifies network failures as unreachable', () => {
    const refused = Object.assign(new Error('connect ECONNREFUSED'), {
      code: 'ECONNREFUSED',
    });
    const error = toAnalysisError(
      new TypeError('request failed', { cause: refused }),
    );

    expect(error.reason).toBe('unreachable');
    expect(error.cause).toBeInstanceOf(TypeError);
  });

  it('treats anything else as an endpoint failure', () => {
    expect(
      toAnalysisError(Object.assign(new Error('Internal'), { status: 500 }))
        .reason,
    ).toBe('endpoint');
    expect(toAnalysisError('weird').message).toBe(
      'Error analyzing brand compatibility: weird',
    );
  });
});
