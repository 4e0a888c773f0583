import { HoverInfo, getTagUrl, renderHover, resolveHover } from '../src/hover';
import { sampleData, shippedData } from './helpers';

const BIB_LINK = '[View full documentation on Library of Congress](https://www.loc.gov/marc/bibliographic/bd245.html)';

function hoverAt(text: string, line: number, character: number): HoverInfo {
  const info = resolveHover(text, line, character, sampleData);
  if (!info) {
    throw new Error(`No hover at ${line}:${character}`);
  }
  return info;
}

describe('resolveHover', () => {
  const title = '=245  10$aTitle$nPart 2';

  test('should resolve the tag over the whole line', () => {
    const info = hoverAt(title, 0, 2);

    expect(info.kind).toBe('tag');
    expect(info.range).toEqual({ start: 0, end: 23 });
    expect(info.fullLine).toBe(true);
    expect(info.kind === 'tag' && info.definition?.name).toBe('Title Statement');
  });

  test('should resolve indicators with their value table', () => {
    const info = hoverAt(title, 0, 6);

    expect(info.kind).toBe('indicator');
    expect(info.range).toEqual({ start: 6, end: 7 });
    expect(info.fullLine).toBe(false);
    expect(info.kind === 'indicator' && info.definition).toEqual({ '0': 'No added entry', '1': 'Added entry' });
  });

  test('should resolve subfields', () => {
    const info = hoverAt(title, 0, 17);

    expect(info.range).toEqual({ start: 15, end: 23 });
    expect(info.kind === 'subfield' && info.definition?.name).toBe('Number of part');
  });

  test('should resolve line mode subfields', () => {
    const info = hoverAt('245 10 $a Title', 0, 8);

    expect(info.format).toBe('line');
    expect(info.range).toEqual({ start: 7, end: 15 });
    expect(info.kind === 'subfield' && info.zone.subfield.content).toBe(' Title');
  });

  test('should pick the fixed-field layout from the record leader', () => {
    const text = ['=LDR  00714cy  a2200205 a 4500', '=008  0000004'].join('\n');
    const info = hoverAt(text, 1, 12);

    expect(info.kind === 'fixed-position' && info.definition?.id).toBe('receipt_status');
    expect(info.kind === 'fixed-position' && info.zone.value).toBe('4');
  });

  test('should use the shipped layouts', () => {
    const info = resolveHover('=008  850101s1985    nyu', 0, 21, shippedData);
    expect(info?.kind === 'fixed-position' && info.definition?.id).toBe('place_of_publication');
  });

  test('should honour an explicit format', () => {
    expect(resolveHover('245 10 $a Title', 0, 8, sampleData, { format: 'mrk' })).toBeNull();
  });

  test('should return null where there is nothing to describe', () => {
    const text = [title, 'Cataloguer notes', '=12$a'].join('\n');

    expect(resolveHover(text, 0, 5, sampleData)).toBeNull();
    expect(resolveHover(text, 1, 3, sampleData)).toBeNull();
    expect(resolveHover(text, 2, 1, sampleData)).toBeNull();
    expect(resolveHover(text, 7, 0, sampleData)).toBeNull();
  });
});

describe('renderHover', () => {
  test('should describe a data field tag', () => {
    expect(renderHover(hoverAt('=245  10$aTitle$nPart 2', 0, 1))).toBe(
      '**245 - Title Statement**\n\n' +
        'Title and statement of responsibility.\n\n' +
        '**Indicators:**\n\n' +
        'Indicator 1:\n' +
        '- `0`: No added entry\n' +
        '- `1`: Added entry\n' +
        '\n' +
        'Indicator 2:\n' +
        '- `0`: No nonfiling characters\n' +
        '\n' +
        '**Subfields:**\n\n' +
        '- `$a`: Title\n' +
        '  Title proper.\n' +
        '- `$c`: Statement of responsibility\n' +
        '- `$n`: Number of part (R)\n' +
        '  Number of part/section.\n' +
        '\n' +
        BIB_LINK
    );
  });

  test('should link holdings tags to the holdings format', () => {
    expect(renderHover(hoverAt('=852  \\\\$bMain', 0, 1))).toBe(
      '**852 - Location**\n\n' +
        'Holding location.\n\n' +
        '*Repeatable field*\n\n' +
        '**Indicators:**\n\n' +
        'Indicator 1:\n' +
        '- ` `: No information provided\n' +
        '\n' +
        '**Subfields:**\n\n' +
        '- `$b`: Sublocation (R)\n' +
        '  Collection.\n' +
        '\n' +
        '[View full documentation on Library of Congress](https://www.loc.gov/marc/holdings/hd852.html)'
    );
  });

  test('should describe a control field tag', () => {
    expect(renderHover(hoverAt('=001  ocm12345', 0, 1))).toBe(
      '**001 - Control Number**\n\nRecord control number.\n\n\n' +
        '[View full documentation on Library of Congress](https://www.loc.gov/marc/bibliographic/bd001.html)'
    );
  });

  test('should omit the link for tags without a documentation page', () => {
    expect(renderHover(hoverAt('=LDR  00714cam a2200205 a 4500', 0, 1))).toBe('**LDR - Leader**\n\nRecord header.\n\n');
  });

  test('should name unknown tags', () => {
    expect(renderHover(hoverAt('=999  \\\\$aLocal', 0, 1))).toBe('Unknown MARC tag 999');
  });

  test('should describe indicator values', () => {
    expect(renderHover(hoverAt('=245  10$aTitle', 0, 6))).toBe(`**Indicator 1:** \`1\`\n\nAdded entry\n\n${BIB_LINK}`);
    expect(renderHover(hoverAt('=245  14$aTitle', 0, 7))).toBe(`**Indicator 2:** \`4\`\n\nUnknown value\n\n${BIB_LINK}`);
  });

  test('should show only the value for undefined indicators', () => {
    expect(renderHover(hoverAt('=500  \\\\$aNote', 0, 7))).toBe('**Indicator 2:** ` `');
  });

  test('should describe subfields with their content', () => {
    expect(renderHover(hoverAt('=245  10$aTitle$nPart 2', 0, 17))).toBe(
      '**$n - Number of part**\n\n' +
        'Number of part/section.\n\n' +
        '*Repeatable subfield*\n\n' +
        '**Content:** Part 2\n\n' +
        BIB_LINK
    );
  });

  test('should name unknown subfields', () => {
    expect(renderHover(hoverAt('=245  10$aTitle$zX', 0, 16))).toBe('**$z** - Unknown subfield for tag 245');
  });

  test('should leave links out when they are turned off', () => {
    const info = hoverAt('=245  10$aTitle', 0, 9);
    expect(renderHover(info, { documentationLinks: false })).toBe('**$a - Title**\n\nTitle proper.\n\n**Content:** Title\n\n');
  });

  describe('Fixed positions', () => {
    const text = ['=LDR  00714cam a2200205 a 4500', '=008  850101s1985    nyu'].join('\n');

    test('should describe a coded position with its other values', () => {
      expect(renderHover(hoverAt(text, 1, 12))).toBe(
        '**008 - Type of date**\n\n' +
          'Position: 6\n' +
          'Value: `s`\n\n' +
          'Type of dates given.\n\n' +
          '**Current:** `s` = Single known date\n\n' +
          '**Other values:**\n' +
          '`m`: Multiple dates\n' +
          '\n' +
          '[View full documentation on Library of Congress](https://www.loc.gov/marc/bibliographic/bd008.html)'
      );
    });

    test('should flag values the table does not know', () => {
      const info = hoverAt('=008  850101x1985', 0, 12);
      expect(renderHover(info, { documentationLinks: false })).toBe(
        '**008 - Type of date**\n\n' +
          'Position: 6\n' +
          'Value: `x`\n\n' +
          'Type of dates given.\n\n' +
          '**Current:** `x` (not recognized)\n\n' +
          '**Other values:**\n' +
          '`s`: Single known date\n' +
          '`m`: Multiple dates\n'
      );
    });

    test('should show a span for multi-character positions', () => {
      expect(renderHover(hoverAt(text, 1, 14), { documentationLinks: false })).toBe(
        '**008 - Date 1**\n\nPosition: 7-10\nValue: `1985`\n\nFirst date.\n\n'
      );
    });

    test('should mark open-ended positions', () => {
      expect(renderHover(hoverAt('=001  ocm12345', 0, 8), { documentationLinks: false })).toBe(
        '**001 - Control Number**\n\nPosition: 0+\nValue: `ocm12345`\n\nRecord control number.\n\n'
      );
    });

    test('should fall back to the offset for undefined positions', () => {
      expect(renderHover(hoverAt(text, 1, 22))).toBe('**008 position 16** - Character position in fixed field');
    });
  });
});

describe('getTagUrl', () => {
  test('should link bibliographic tags', () => {
    expect(getTagUrl('245')).toBe('https://www.loc.gov/marc/bibliographic/bd245.html');
    expect(getTagUrl('879')).toBe('https://www.loc.gov/marc/bibliographic/bd879.html');
  });

  test('should link holdings tags', () => {
    expect(getTagUrl('852')).toBe('https://www.loc.gov/marc/holdings/hd852.html');
    expect(getTagUrl('878')).toBe('https://www.loc.gov/marc/holdings/hd878.html');
    expect(getTagUrl('880')).toBe('https://www.loc.gov/marc/holdings/hd880.html');
  });

  test('should have no page for non-numeric tags', () => {
    expect(getTagUrl('LDR')).toBeUndefined();
    expect(getTagUrl('24')).toBeUndefined();
  });
});
