import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { createStructuredExtractor, projectEntry } from '../src/pipeline/extract/structured.js';
import { entryAt, intradayBody, parisEpoch } from './helpers/payloads.js';

const extractFrom = (body: string, collectionPath = 'current') =>
  createStructuredExtractor(collectionPath).extract(body, JSON.parse(body));

describe('structured extractor', () => {
  it('projects every entry with timestamp and open price', () => {
    const body = intradayBody([entryAt(9, 0), entryAt(9, 5, 7410)]);
    assert.deepEqual(extractFrom(body), [
      { timestampEpoch: parisEpoch(9, 0), open: '7400.5', close: '7401.25', high: '7402', low: '7398.5' },
      { timestampEpoch: parisEpoch(9, 5), open: '7410.5', close: '7411.25', high: '7412', low: '7408.5' },
    ]);
  });

  it('drops exactly the entries missing the timestamp or the open price', () => {
    const body = intradayBody([
      entryAt(9, 0),
      { Date: null, OpenPrice: 7400, ClosePrice: 7401, High: 7402, Low: 7399 },
      { Date: parisEpoch(9, 10), OpenPrice: null, ClosePrice: 7401, High: 7402, Low: 7399 },
      entryAt(9, 15),
    ]);
    const observations = extractFrom(body);
    assert.equal(observations.length, 2);
    assert.deepEqual(
      observations.map((observation) => observation.timestampEpoch),
      [parisEpoch(9, 0), parisEpoch(9, 15)],
    );
  });

  it('keeps entries whose close, high or low are null', () => {
    const body = intradayBody([{ Date: parisEpoch(9, 0), OpenPrice: 7400, ClosePrice: null }]);
    assert.deepEqual(extractFrom(body), [
      { timestampEpoch: parisEpoch(9, 0), open: '7400', close: null, high: null, low: null },
    ]);
  });

  it('keeps entries whose close, high or low carry unusable values and leaves those fields empty', () => {
    const body = JSON.stringify({
      current: [
        { Date: parisEpoch(9, 0), OpenPrice: 7400, ClosePrice: 7401, High: '', Low: 7399 },
        { Date: parisEpoch(9, 5), OpenPrice: 7400, ClosePrice: false, High: { value: 1 }, Low: [7399] },
      ],
    });
    assert.deepEqual(extractFrom(body), [
      { timestampEpoch: parisEpoch(9, 0), open: '7400', close: '7401', high: null, low: '7399' },
      { timestampEpoch: parisEpoch(9, 5), open: '7400', close: null, high: null, low: null },
    ]);
  });

  it('keeps provider strings verbatim', () => {
    const observation = projectEntry({ Date: '1705305600', OpenPrice: '7400.50', ClosePrice: '7401.00' });
    assert.deepEqual(observation, {
      timestampEpoch: 1705305600,
      open: '7400.50',
      close: '7401.00',
      high: null,
      low: null,
    });
  });

  it('drops entries with non-integer timestamps or unexpected shapes', () => {
    assert.equal(projectEntry({ Date: 1705305600.5, OpenPrice: 1 }), null);
    assert.equal(projectEntry({ Date: 1705305600, OpenPrice: { value: 1 } }), null);
    assert.equal(projectEntry('not an entry'), null);
  });

  it('reads nested collections and root arrays', () => {
    const nested = JSON.stringify({ data: { points: [entryAt(10, 0)] } });
    assert.equal(extractFrom(nested, 'data.points').length, 1);

    const rootArray = JSON.stringify([entryAt(10, 0), entryAt(10, 1)]);
    assert.equal(extractFrom(rootArray, 'current').length, 2);
  });

  it('returns nothing when the document has no collection', () => {
    assert.deepEqual(extractFrom('{"current": {"Date": 1}}'), []);
    assert.deepEqual(createStructuredExtractor('current').extract('plain text'), []);
  });
});
