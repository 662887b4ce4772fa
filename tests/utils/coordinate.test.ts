import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseCoordinate } from '../../src/utils/coordinate.js';
import { ValidationError } from '../../src/utils/errors.js';

describe('parseCoordinate', () => {
  it('splits group, artifact and version', () => {
    assert.deepEqual(parseCoordinate('com.example:widget:1.0+'), {
      group: 'com.example',
      artifact: 'widget',
      version: '1.0+'
    });
  });

  it('trims whitespace around the parts', () => {
    assert.deepEqual(parseCoordinate(' com.example : widget : LATEST '), {
      group: 'com.example',
      artifact: 'widget',
      version: 'LATEST'
    });
  });

  it('rejects coordinates without exactly three parts', () => {
    for (const input of ['com.example:widget', 'com.example:widget:1.0:aar', 'com.example::1.0', '']) {
      assert.throws(() => parseCoordinate(input), ValidationError, input);
    }
  });
});
