import { describe, it, expect } from 'vitest';
import { childElement, childElements, parseTimeline, selectPath } from '../timeline/document';
import {
  applyTimelinePatch,
  isTimelineCategory,
  resolveTimelinePatch,
  transformTimeline,
  type TimelineActivity,
} from '../timeline/transformer';

const TCX_NS = 'http://www.garmin.com/xmlschemas/TrainingCenterDatabase/v2';

function timeline(id: string, extra: string = ''): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<TrainingCenterDatabase xmlns="${TCX_NS}">`,
    '  <Activities>',
    '    <Activity Sport="Other">',
    `      <Id>${id}</Id>`,
    extra,
    '      <Creator>',
    '        <UnitId>0</UnitId>',
    '        <ProductID>0</ProductID>',
    '      </Creator>',
    '    </Activity>',
    '  </Activities>',
    '</TrainingCenterDatabase>',
  ].join('\n');
}

function activityOf(document: Document): Element {
  const activity = selectPath(document, ['TrainingCenterDatabase', 'Activities', 'Activity']);
  if (!activity) throw new Error('no activity');
  return activity;
}

function names(parent: Element): string[] {
  return childElements(parent).map((child) => child.localName);
}

function text(parent: Element, name: string): string | null {
  return childElement(parent, name)?.textContent ?? null;
}

const swim: TimelineActivity = {
  category: 'Swim',
  durationMs: 60_000,
  distanceMeters: 1000,
  calories: 120,
};

describe('resolveTimelinePatch', () => {
  it('maps categories to patches', () => {
    expect(resolveTimelinePatch('Swim')).toEqual({ kind: 'synthesize-lap', category: 'Swim' });
    expect(resolveTimelinePatch('Treadmill')).toEqual({ kind: 'device-name', category: 'Treadmill' });
    expect(resolveTimelinePatch('Weights')).toEqual({ kind: 'device-name', category: 'Weights' });
    expect(resolveTimelinePatch('Run')).toEqual({ kind: 'none' });
    expect(resolveTimelinePatch('swim')).toEqual({ kind: 'none' });
  });

  it('ignores inherited object keys', () => {
    expect(isTimelineCategory('toString')).toBe(false);
    expect(resolveTimelinePatch('constructor')).toEqual({ kind: 'none' });
  });
});

describe('transformTimeline: Swim', () => {
  it('synthesizes a lap with a two point track', () => {
    const output = transformTimeline(parseTimeline(timeline('2024-01-01T00:00:00Z')), swim);
    const activity = activityOf(parseTimeline(output));

    expect(activity.getAttribute('Sport')).toBe('Swim');
    expect(names(activity)).toEqual(['Id', 'Lap', 'Creator']);

    const creator = childElement(activity, 'Creator');
    if (!creator) throw new Error('no creator');
    expect(names(creator)).toEqual(['Name', 'UnitId', 'ProductID']);
    expect(text(creator, 'Name')).toBe('Fitbit');

    const lap = childElement(activity, 'Lap');
    if (!lap) throw new Error('no lap');
    expect(lap.namespaceURI).toBe(TCX_NS);
    expect(lap.getAttribute('StartTime')).toBe('2024-01-01T00:00:00Z');
    expect(names(lap)).toEqual([
      'TotalTimeSeconds',
      'DistanceMeters',
      'Calories',
      'Intensity',
      'TriggerMethod',
      'Track',
    ]);
    expect(text(lap, 'TotalTimeSeconds')).toBe('60');
    expect(text(lap, 'DistanceMeters')).toBe('1000');
    expect(text(lap, 'Calories')).toBe('120');
    expect(text(lap, 'Intensity')).toBe('Active');
    expect(text(lap, 'TriggerMethod')).toBe('Manual');

    const track = childElement(lap, 'Track');
    if (!track) throw new Error('no track');
    const points = childElements(track);
    expect(points.map((point) => point.localName)).toEqual(['Trackpoint', 'Trackpoint']);
    expect(points.map((point) => text(point, 'Time'))).toEqual([
      '2024-01-01T00:00:00Z',
      '2024-01-01T00:01:00Z',
    ]);
    expect(points.map((point) => text(point, 'DistanceMeters'))).toEqual(['0', '1000']);
  });

  it('normalizes offsets to UTC and truncates the end time', () => {
    const document = parseTimeline(timeline('2024-01-01T01:00:00.000+01:00'));
    applyTimelinePatch(document, { ...swim, durationMs: 90_500 });
    const lap = childElement(activityOf(document), 'Lap');
    if (!lap) throw new Error('no lap');

    expect(lap.getAttribute('StartTime')).toBe('2024-01-01T00:00:00Z');
    expect(text(lap, 'TotalTimeSeconds')).toBe('90.5');
    const track = childElement(lap, 'Track');
    const last = track ? childElements(track)[1] : undefined;
    expect(last && text(last, 'Time')).toBe('2024-01-01T00:01:30Z');
  });

  it('adds only whole seconds of the duration to a fractional start', () => {
    const document = parseTimeline(timeline('2024-01-01T07:00:00.600+01:00'));
    applyTimelinePatch(document, { ...swim, durationMs: 1500 });
    const lap = childElement(activityOf(document), 'Lap');
    if (!lap) throw new Error('no lap');

    expect(lap.getAttribute('StartTime')).toBe('2024-01-01T06:00:00Z');
    expect(text(lap, 'TotalTimeSeconds')).toBe('1.5');
    const track = childElement(lap, 'Track');
    const last = track ? childElements(track)[1] : undefined;
    expect(last && text(last, 'Time')).toBe('2024-01-01T06:00:01Z');
  });

  it('places the lap before Notes', () => {
    const document = parseTimeline(timeline('2024-01-01T00:00:00Z', '      <Notes>pool</Notes>'));
    applyTimelinePatch(document, swim);
    expect(names(activityOf(document))).toEqual(['Id', 'Lap', 'Notes', 'Creator']);
  });

  it('rejects an unparseable activity id', () => {
    const document = parseTimeline(timeline('yesterday'));
    expect(() => applyTimelinePatch(document, swim)).toThrow(
      expect.objectContaining({ code: 'TIMESTAMP_PARSE' })
    );
    expect(childElement(activityOf(document), 'Lap')).toBeNull();
  });

  it('adds elements again when applied twice', () => {
    const document = parseTimeline(timeline('2024-01-01T00:00:00Z'));
    applyTimelinePatch(document, swim);
    applyTimelinePatch(document, swim);
    const activity = activityOf(document);
    expect(names(activity)).toEqual(['Id', 'Lap', 'Lap', 'Creator']);
    const creator = childElement(activity, 'Creator');
    expect(creator && names(creator)).toEqual(['Name', 'Name', 'UnitId', 'ProductID']);
  });
});

describe('transformTimeline: device name', () => {
  it.each(['Treadmill', 'Weights'])('adds one Name for %s and no lap', (category) => {
    const output = transformTimeline(parseTimeline(timeline('2024-01-01T00:00:00Z')), {
      ...swim,
      category,
    });
    const activity = activityOf(parseTimeline(output));
    expect(activity.getAttribute('Sport')).toBe('Other');
    expect(names(activity)).toEqual(['Id', 'Creator']);
    const creator = childElement(activity, 'Creator');
    expect(creator && names(creator)).toEqual(['Name', 'UnitId', 'ProductID']);
    expect(creator && text(creator, 'Name')).toBe('Fitbit');
  });

  it('writes the indented document', () => {
    const input =
      '<TrainingCenterDatabase><Activities><Activity Sport="Other">' +
      '<Id>2024-03-02T08:15:00.000+01:00</Id><Creator><Version>1</Version></Creator>' +
      '</Activity></Activities></TrainingCenterDatabase>';
    const output = transformTimeline(parseTimeline(input), { ...swim, category: 'Treadmill' });
    expect(output).toBe(
      [
        '<TrainingCenterDatabase>',
        '  <Activities>',
        '    <Activity Sport="Other">',
        '      <Id>2024-03-02T08:15:00.000+01:00</Id>',
        '      <Creator>',
        '        <Name>Fitbit</Name>',
        '        <Version>1</Version>',
        '      </Creator>',
        '    </Activity>',
        '  </Activities>',
        '</TrainingCenterDatabase>',
        '',
      ].join('\n')
    );
  });

  it('fails without a Creator', () => {
    const document = parseTimeline(
      '<TrainingCenterDatabase><Activities><Activity><Id>x</Id></Activity></Activities></TrainingCenterDatabase>'
    );
    expect(() => applyTimelinePatch(document, { ...swim, category: 'Weights' })).toThrow(
      expect.objectContaining({ code: 'MALFORMED_TIMELINE' })
    );
  });

  it('fails without an Activity', () => {
    const document = parseTimeline('<TrainingCenterDatabase><Activities/></TrainingCenterDatabase>');
    expect(() => applyTimelinePatch(document, { ...swim, category: 'Treadmill' })).toThrow(
      expect.objectContaining({ code: 'MALFORMED_TIMELINE' })
    );
  });
});

describe('transformTimeline: other categories', () => {
  it('only re-indents', () => {
    const input = '<?xml version="1.0" encoding="UTF-8"?>\n<TrainingCenterDatabase><Activities/></TrainingCenterDatabase>';
    const document = parseTimeline(input);
    expect(applyTimelinePatch(document, { ...swim, category: 'Run' })).toEqual({ kind: 'none' });
    expect(transformTimeline(parseTimeline(input), { ...swim, category: 'Run' })).toBe(
      '<?xml version="1.0" encoding="UTF-8"?>\n<TrainingCenterDatabase>\n  <Activities/>\n</TrainingCenterDatabase>\n'
    );
  });
});
