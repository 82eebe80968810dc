import { formatDate, renderTemplateSafe } from '../strings';

describe('renderTemplateSafe', () => {
  test('renders values', () => {
    expect(
      renderTemplateSafe('{{tag}} ({{date}})', {
        tag: 'v1.2.0',
        date: '2024-03-01',
      })
    ).toBe('v1.2.0 (2024-03-01)');
  });

  test('does not escape HTML characters', () => {
    expect(renderTemplateSafe('{{ name }}', { name: '<b>&"' })).toBe('<b>&"');
  });

  test('renders missing values as empty strings', () => {
    expect(renderTemplateSafe('[{{ missing }}]', {})).toBe('[]');
  });

  test('does not render globals', () => {
    expect(renderTemplateSafe('{{ process }}', {})).toBe('');
  });
});

describe('formatDate', () => {
  test('formats dates in UTC', () => {
    expect(formatDate(new Date('2024-03-01T23:30:00-05:00'))).toBe(
      '2024-03-02'
    );
  });
});
