import { describe, it, expect } from 'vitest';
import { SubtitleDocument } from '../document/subtitle-document.js';
import { ValidateStage, VALIDATION_PRESETS } from './stage-3-validate.js';
import { issueFeedback, issueSeverity, isCritical } from '../quality/validation-issue.js';

/** One entry per pair of [original, translation]; undefined leaves it untranslated */
function translatedDoc(pairs: Array<[string, string | undefined, number?]>): SubtitleDocument {
  const doc = SubtitleDocument.fromEntries(
    pairs.map(([text], i) => ({ seq: i + 1, startMs: i * 3_000, endMs: i * 3_000 + 2_000, text })),
    'en'
  ).withTargetLanguage('es');
  pairs.forEach(([, translated, confidence], i) => {
    if (translated !== undefined) doc.entries[i].setTranslation(translated, confidence);
  });
  return doc;
}

const quiet = { quiet: true };

describe('ValidateStage', () => {
  it('passes a clean translation', () => {
    const report = new ValidateStage({}, quiet).validate(translatedDoc([['Hello there', 'Hola amigos', 0.9]]));

    expect(report.issues).toEqual([]);
    expect(report.qualityScore).toBe(1);
    expect(report.passed()).toBe(true);
  });

  it('reports missing and empty translations only', () => {
    const report = new ValidateStage({}, quiet).validate(translatedDoc([['Hello', undefined], ['Goodbye', '   ']]));

    expect(report.issues).toEqual([
      { kind: 'missing_translation', entryId: 1 },
      { kind: 'empty_translation', entryId: 2 },
    ]);
    expect(report.qualityScore).toBe(0);
    expect(report.criticalIssues()).toHaveLength(2);
  });

  it('scores by severity per entry', () => {
    const report = new ValidateStage({}, quiet).validate(translatedDoc([['Hello', undefined], ['Hi there', 'Hola allí']]));

    expect(report.qualityScore).toBe(0.5);
    expect(report.summary()).toBe('Validated 2 entries: 1 issues found, 1 entries affected, quality score: 50.00%');
  });

  it('checks the length ratio against the configured bounds', () => {
    const report = new ValidateStage({}, quiet).validate(translatedDoc([['Hi', 'xxxxxxxx'], ['Good evening', 'Hi']]));

    expect(report.issues).toEqual([
      { kind: 'length_too_long', entryId: 1, originalLength: 2, translatedLength: 8, ratio: 4, bound: 1.5 },
      { kind: 'length_too_short', entryId: 2, originalLength: 12, translatedLength: 2, ratio: 2 / 12, bound: 0.3 },
    ]);
    expect(issueSeverity(report.issues[0])).toBe(1);
    expect(issueFeedback(report.issues[0])).toBe(
      'Translation is 300% longer than the original; shorten it to under 150% of the original length.'
    );
  });

  it('uses stricter bounds in the strict preset', () => {
    const doc = translatedDoc([['abcdefghij', 'abcdefghijklm']]);
    expect(new ValidateStage({}, quiet).validate(doc).issues).toEqual([]);
    expect(new ValidateStage(VALIDATION_PRESETS.strict, quiet).validate(doc).issues.map(i => i.kind)).toEqual([
      'length_too_long',
    ]);
  });

  it('flags low confidence', () => {
    const report = new ValidateStage({}, quiet).validate(translatedDoc([['Hello there', 'Hola amigos', 0.2]]));

    expect(report.issues).toEqual([{ kind: 'low_confidence', entryId: 1, confidence: 0.2 }]);
    expect(isCritical(report.issues[0])).toBe(true);
  });

  it('runs the semantic check', () => {
    const stage = new ValidateStage(
      {},
      {
        quiet: true,
        semanticCheck: entry => (entry.id === 2 ? { score: 0.3, reason: 'negation lost' } : undefined),
      }
    );
    const report = stage.validate(translatedDoc([
      ['I agree with you', 'Estoy de acuerdo'],
      ['I do not agree with you', 'Estoy de acuerdo'],
    ]));

    expect(report.issues).toEqual([{ kind: 'semantic_divergence', entryId: 2, score: 0.3, reason: 'negation lost' }]);
    expect(issueSeverity(report.issues[0])).toBe(0.8);
  });

  it('restores dropped italics on repair', () => {
    const doc = translatedDoc([['<i>Run now!</i>', 'Corre ya!', 0.9]]);
    const report = new ValidateStage({}, quiet).validateAndRepair(doc);

    expect(doc.getEntry(1)?.translatedText).toBe('<i>Corre ya!</i>');
    expect(doc.getEntry(1)?.confidence).toBe(0.9);
    expect(report.rawIssues).toEqual([{ kind: 'missing_formatting', entryId: 1, tag: 'italic' }]);
    expect(report.issues).toEqual([]);
    expect(report.repair).toEqual({
      success: true,
      actions: [{ type: 'added_formatting', entryId: 1, tag: 'italic' }],
      unresolvedIssues: [],
    });
  });

  it('cannot place italics that covered part of a line', () => {
    const doc = translatedDoc([['Run <i>now</i>!', 'Corre ya!']]);
    const report = new ValidateStage({}, quiet).validateAndRepair(doc);

    expect(report.repair?.actions).toEqual([
      { type: 'no_repair_possible', entryId: 1, reason: 'Could not determine formatting placement' },
    ]);
    expect(report.repair?.success).toBe(false);
    expect(report.issues).toEqual([{ kind: 'missing_formatting', entryId: 1, tag: 'italic' }]);
  });

  it('enforces glossary terms and keeps unfixable names unresolved', () => {
    const doc = translatedDoc([['Alice sees the Castle.', 'Alicia ve el Castle.']]);
    doc.glossary.addCharacter('Alice');
    doc.glossary.addTerm('Castle', 'Castillo');

    const report = new ValidateStage({}, quiet).validateAndRepair(doc);

    expect(doc.getEntry(1)?.translatedText).toBe('Alicia ve el Castillo.');
    expect(report.repair?.actions).toEqual([
      { type: 'applied_glossary_correction', entryId: 1, before: 'Alicia ve el Castle.', after: 'Alicia ve el Castillo.' },
    ]);
    expect(report.repair?.success).toBe(false);
    expect(report.issues).toEqual([
      { kind: 'glossary_inconsistency', entryId: 1, issue: { kind: 'missing_name', term: 'Alice' } },
    ]);
  });

  it('leaves the document alone when auto repair is off', () => {
    const doc = translatedDoc([['<i>Run now!</i>', 'Corre ya!']]);
    const report = new ValidateStage({ enableAutoRepair: false }, quiet).validateAndRepair(doc);

    expect(doc.getEntry(1)?.translatedText).toBe('Corre ya!');
    expect(report.repair).toBeUndefined();
  });

  it('never raises the score as more entries go missing', () => {
    const pairs: Array<[string, string]> = [
      ['Hello there', 'Hola amigos'],
      ['Where is she', 'Dónde está ella'],
      ['Come with me', 'Ven conmigo'],
      ['Not tonight', 'Esta noche no'],
    ];
    const stage = new ValidateStage({}, quiet);
    const reports = [0, 1, 2, 3, 4].map(missing =>
      stage.validate(translatedDoc(pairs.map(([o, t], i) => [o, i < missing ? undefined : t])))
    );

    const scores = reports.map(r => r.qualityScore);
    const overall = reports.map(r => r.metrics.overall);
    expect(scores).toEqual([1, 0.75, 0.5, 0.25, 0]);
    for (let i = 1; i < overall.length; i++) {
      expect(overall[i]).toBeLessThan(overall[i - 1]);
    }
  });

  it('wraps validation in a stage result', () => {
    const result = new ValidateStage({}, quiet).execute(translatedDoc([['Hello there', 'Hola amigos']]));
    expect(result.stage).toBe('validate');
    expect(result.success).toBe(true);
    expect(result.data?.passed()).toBe(true);
  });
});
