import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CrossRefService } from '../../src/services/crossref.service.js';
import { JsonHttpClient } from '../../src/services/http.js';
import { silentLogger } from '../mocks/logger.js';
import { crossRefWork, jsonResponse } from '../mocks/openalex.js';

// Mock global fetch
const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

describe('CrossRefService', () => {
  let service: CrossRefService;

  beforeEach(() => {
    mockFetch.mockReset();
    const http = new JsonHttpClient({ userAgent: 'test', timeoutMs: 1000, logger: silentLogger() });
    service = new CrossRefService({ http });
  });

  it('should unwrap the message of a work', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(crossRefWork()));

    const result = await service.getWork('10.1234/test.1');

    expect(result.status === 'found' && result.data.DOI).toBe('10.1234/test.1');
    expect(mockFetch.mock.calls[0][0]).toBe('https://api.crossref.org/works/10.1234%2Ftest.1');
  });

  it('should report an unknown DOI as not found', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse('Resource not found.', 404));

    await expect(service.getWork('10.1234/missing')).resolves.toEqual({ status: 'not_found' });
  });

  it('should collect notices from both update fields', () => {
    const work = crossRefWork({
      'updated-by': [{ type: 'retraction', DOI: '10.1234/retraction.1' }],
      'update-to': [{ type: 'correction', DOI: '10.1234/correction.1' }],
    }).message;

    expect(CrossRefService.notices(work).map((n) => n.type)).toEqual(['retraction', 'correction']);
  });
});
