import { parseTextGrid, textGridToFragments, TextGridParseError } from '../../src/utils/textgrid-parser';

const LONG_TEXTGRID = `File type = "ooTextFile"
Object class = "TextGrid"

xmin = 0 
xmax = 1.5 
tiers? <exists> 
size = 2 
item []: 
    item [1]:
        class = "IntervalTier" 
        name = "words" 
        xmin = 0 
        xmax = 1.5 
        intervals: size = 4 
        intervals [1]:
            xmin = 0 
            xmax = 0.2 
            text = "" 
        intervals [2]:
            xmin = 0.2 
            xmax = 0.7 
            text = "hello" 
        intervals [3]:
            xmin = 0.7 
            xmax = 1.2004 
            text = "<unk>" 
        intervals [4]:
            xmin = 1.2004 
            xmax = 1.5 
            text = "<eps>" 
    item [2]:
        class = "IntervalTier" 
        name = "phones" 
        xmin = 0 
        xmax = 1.5 
        intervals: size = 1 
        intervals [1]:
            xmin = 0 
            xmax = 1.5 
            text = "HH" 
`;

const SHORT_TEXTGRID = `File type = "ooTextFile"
Object class = "TextGrid"

0
1
<exists>
2
"IntervalTier"
"words"
0
1
2
0
0.4
"say ""hi"""
0.4
1
"there"
"TextTier"
"events"
0
1
1
0.5
"click"
`;

describe('parseTextGrid', () => {
  test('reads the long layout', () => {
    const grid = parseTextGrid(LONG_TEXTGRID);

    expect(grid.xmin).toBe(0);
    expect(grid.xmax).toBe(1.5);
    expect(grid.tiers.map((t) => [t.kind, t.name])).toEqual([
      ['interval', 'words'],
      ['interval', 'phones'],
    ]);
  });

  test('reads the short layout with point tiers and escaped quotes', () => {
    const grid = parseTextGrid(SHORT_TEXTGRID);

    expect(grid.tiers[0]).toEqual({
      kind: 'interval',
      name: 'words',
      xmin: 0,
      xmax: 1,
      intervals: [
        { xmin: 0, xmax: 0.4, text: 'say "hi"' },
        { xmin: 0.4, xmax: 1, text: 'there' },
      ],
    });
    expect(grid.tiers[1]).toEqual({
      kind: 'point',
      name: 'events',
      xmin: 0,
      xmax: 1,
      points: [{ time: 0.5, mark: 'click' }],
    });
  });

  test('a grid without tiers', () => {
    const content = 'File type = "ooTextFile"\nObject class = "TextGrid"\n\n0\n2\n<absent>\n';
    expect(parseTextGrid(content)).toEqual({ xmin: 0, xmax: 2, tiers: [] });
  });

  test('a byte order mark is ignored', () => {
    expect(parseTextGrid(`\uFEFF${SHORT_TEXTGRID}`).tiers).toHaveLength(2);
  });

  test('rejects other Praat objects', () => {
    expect(() => parseTextGrid('File type = "ooTextFile"\nObject class = "Pitch 1"\n')).toThrow(
      'Invalid TextGrid: unsupported header "ooTextFile" / "Pitch 1"'
    );
  });

  test('rejects a truncated file', () => {
    const truncated = LONG_TEXTGRID.slice(0, LONG_TEXTGRID.indexOf('intervals [2]:'));
    expect(() => parseTextGrid(truncated)).toThrow(TextGridParseError);
  });

  test('rejects text that is not a TextGrid', () => {
    expect(() => parseTextGrid('hello')).toThrow('Invalid TextGrid: unexpected end of file, expected string');
  });
});

describe('textGridToFragments', () => {
  test('uses the first interval tier and skips silence', () => {
    expect(textGridToFragments(LONG_TEXTGRID)).toEqual([
      { text: 'hello', start: 0.2, end: 0.7 },
      { text: '<unk>', start: 0.7, end: 1.2 },
    ]);
  });

  test('reads a named tier', () => {
    expect(textGridToFragments(LONG_TEXTGRID, { tierName: 'phones' })).toEqual([
      { text: 'HH', start: 0, end: 1.5 },
    ]);
  });

  test('unknown tier name', () => {
    expect(() => textGridToFragments(LONG_TEXTGRID, { tierName: 'missing' })).toThrow(
      'Invalid TextGrid: no interval tier named "missing"'
    );
  });

  test('parse errors are client errors', () => {
    try {
      textGridToFragments('hello');
      throw new Error('expected a throw');
    } catch (error) {
      expect(error).toBeInstanceOf(TextGridParseError);
      expect((error as TextGridParseError).statusCode).toBe(400);
      expect((error as TextGridParseError).code).toBe('MALFORMED_TEXTGRID');
    }
  });
});
