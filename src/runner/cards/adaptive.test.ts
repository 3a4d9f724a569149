import { describe, expect, it } from 'vitest';

import { parseAdaptiveCard } from './adaptive';

describe('parseAdaptiveCard', () => {
  it('returns null when body is missing or not an array', () => {
    expect(parseAdaptiveCard({ type: 'AdaptiveCard' })).toBeNull();
    expect(parseAdaptiveCard({ body: 'nope' })).toBeNull();
    expect(parseAdaptiveCard(null)).toBeNull();
    expect(parseAdaptiveCard('{not json')).toBeNull();
  });

  it('parses JSON text content', () => {
    const text = JSON.stringify({
      body: [{ type: 'Input.Text', id: 'name', label: 'Name' }],
    });
    expect(parseAdaptiveCard(text)).toEqual([
      { type: 'Input.Text', id: 'name', label: 'Name' },
    ]);
  });

  it('falls back from label to placeholder to id', () => {
    const inputs = parseAdaptiveCard({
      body: [
        { type: 'Input.Text', id: 'a', label: 'A label', placeholder: 'A ph' },
        { type: 'Input.Date', id: 'b', placeholder: 'B ph' },
        { type: 'Input.Time', id: 'c' },
      ],
    });
    expect(inputs?.map((i) => i.label)).toEqual(['A label', 'B ph', 'c']);
  });

  it('skips inputs without an id, non-inputs and non-objects', () => {
    const inputs = parseAdaptiveCard({
      body: [
        { type: 'TextBlock', text: 'hello' },
        { type: 'Input.Text', label: 'no id' },
        { type: 'Input.Text', id: '  ' },
        'stray',
        42,
        { type: 'Input.Number', id: 'qty' },
      ],
    });
    expect(inputs).toEqual([{ type: 'Input.Number', id: 'qty', label: 'qty' }]);
  });

  it('visits inputs inside containers and columns in document order', () => {
    const inputs = parseAdaptiveCard({
      body: [
        { type: 'Input.Text', id: 'first' },
        {
          type: 'Container',
          items: [
            {
              type: 'ColumnSet',
              columns: [
                {
                  type: 'Column',
                  items: [{ type: 'Input.Text', id: 'left' }],
                },
                {
                  type: 'Column',
                  items: [{ type: 'Input.Text', id: 'right' }],
                },
              ],
            },
          ],
        },
        { type: 'Input.Text', id: 'last' },
      ],
    });
    expect(inputs?.map((i) => i.id)).toEqual([
      'first',
      'left',
      'right',
      'last',
    ]);
  });

  it('reads choices and toggle values', () => {
    const inputs = parseAdaptiveCard({
      body: [
        {
          type: 'Input.ChoiceSet',
          id: 'color',
          choices: [{ title: 'Red', value: 'r' }, { title: 'Blue' }, 'junk'],
        },
        { type: 'Input.Toggle', id: 'agree', valueOn: 'Y', valueOff: 'N' },
      ],
    });
    expect(inputs).toEqual([
      {
        type: 'Input.ChoiceSet',
        id: 'color',
        label: 'color',
        choices: [{ title: 'Red', value: 'r' }, { title: 'Blue' }, {}],
      },
      {
        type: 'Input.Toggle',
        id: 'agree',
        label: 'agree',
        valueOn: 'Y',
        valueOff: 'N',
      },
    ]);
  });
});
