import { describe, expect, test } from 'vitest';
import {
  contentStep,
  contentText,
  isEmptySection,
  isIntermediateReference,
  isRegularReference,
  parseCooklang,
  referencedFrom,
  referencesTo,
} from '../src/index';
import { at, getSteps } from './helpers';

const relations = (source: string) => parseCooklang(source).recipe.ingredients.map(i => i.relation);

describe('references', () => {
  test('reference to a previous definition', () => {
    expect(relations('@flour{1000%g}\n\n@&flour{100%g}')).toEqual([
      { type: 'definition', referencedFrom: [1], definedInStep: true },
      { type: 'reference', referencesTo: 0, referenceTarget: 'ingredient' },
    ]);
  });

  test('names match ignoring case', () => {
    const [, reference] = relations('@Flour{1%kg}\n\n@&flour{}');
    expect(reference && referencesTo(reference)).toBe(0);
  });

  test('the latest definition wins', () => {
    expect(relations('@salt{1%g}\n\n@salt{2%g}\n\n@&salt{}')).toEqual([
      { type: 'definition', referencedFrom: [], definedInStep: true },
      { type: 'definition', referencedFrom: [2], definedInStep: true },
      { type: 'reference', referencesTo: 1, referenceTarget: 'ingredient' },
    ]);
  });

  test('a dangling reference stays a definition', () => {
    const { recipe, errors } = parseCooklang('Add @&butter{10%g}.');
    expect(errors.map(e => e.message)).toEqual(['Reference not found: butter']);
    expect(at(recipe.ingredients, 0).relation).toEqual({ type: 'definition', referencedFrom: [], definedInStep: true });
  });

  test('cookware references', () => {
    const { recipe } = parseCooklang('Heat #pan{}.\n\nClean #&pan.');
    expect(recipe.cookware.map(c => c.relation)).toEqual([
      { type: 'definition', referencedFrom: [1], definedInStep: true },
      { type: 'reference', referencesTo: 0 },
    ]);
  });

  test('duplicates become references in reference mode', () => {
    expect(relations('>> [duplicate]: reference\n@salt{1%g}\n\n@salt{2%g}\n')).toEqual([
      { type: 'definition', referencedFrom: [1], definedInStep: true },
      { type: 'reference', referencesTo: 0, referenceTarget: 'ingredient' },
    ]);
  });

  test('new modifier forces a definition', () => {
    expect(relations('>> [duplicate]: reference\n@salt{1%g}\n\n@+salt{2%g}\n').map(r => r.type)).toEqual([
      'definition',
      'definition',
    ]);
  });
});

describe('modes', () => {
  test('components mode defines without a step', () => {
    const source = `>> [mode]: components
@flour{100%g} @salt

>> [mode]: all
Mix @&flour{} with @&salt.
`;
    const { recipe, errors } = parseCooklang(source);
    expect(errors).toEqual([]);
    expect(recipe.ingredients.map(i => i.relation)).toEqual([
      { type: 'definition', referencedFrom: [2], definedInStep: false },
      { type: 'definition', referencedFrom: [3], definedInStep: false },
      { type: 'reference', referencesTo: 0, referenceTarget: 'ingredient' },
      { type: 'reference', referencesTo: 1, referenceTarget: 'ingredient' },
    ]);
    expect(getSteps(recipe)).toEqual([
      {
        number: 1,
        items: [
          { type: 'text', value: 'Mix ' },
          { type: 'ingredient', index: 2 },
          { type: 'text', value: ' with ' },
          { type: 'ingredient', index: 3 },
          { type: 'text', value: '.' },
        ],
      },
    ]);
  });

  test('steps mode makes every component a reference', () => {
    const source = '>> [mode]: components\n@salt{5%g}\n\n>> [mode]: steps\nAdd @salt{2%g}.\n';
    expect(relations(source)).toEqual([
      { type: 'definition', referencedFrom: [1], definedInStep: false },
      { type: 'reference', referencesTo: 0, referenceTarget: 'ingredient' },
    ]);
  });

  test('text mode keeps steps as text', () => {
    const { recipe, warnings } = parseCooklang('>> [mode]: text\nMix @flour{100%g} well.\n');
    expect(recipe.ingredients).toEqual([]);
    expect(at(recipe.sections, 0).content).toEqual([{ type: 'text', value: 'Mix @flour{100%g} well.' }]);
    expect(warnings.map(w => w.message)).toEqual(['Ignoring ingredient in text mode']);
  });

  test('invalid mode value', () => {
    const { recipe, warnings } = parseCooklang('>> [mode]: banana');
    expect(recipe.metadata).toEqual({});
    expect(warnings.map(w => w.message)).toEqual(["Invalid value for '[mode]': 'banana'"]);
    expect(at(warnings, 0).hints).toEqual(['Possible values are: all, components, steps and text']);
  });
});

describe('intermediate preparations', () => {
  test('relative step', () => {
    const source = 'Mix @flour{100%g} and @water{50%ml}.\n\nKnead @&(~1)dough{}.\n';
    const { recipe, errors } = parseCooklang(source);
    expect(errors).toEqual([]);
    const dough = at(recipe.ingredients, 2);
    expect(dough.relation).toEqual({ type: 'reference', referencesTo: 0, referenceTarget: 'step' });
    expect(isIntermediateReference(dough.relation)).toBe(true);
    expect(isRegularReference(dough.relation)).toBe(false);
  });

  test('step number points into the section content', () => {
    const { recipe } = parseCooklang('> intro\n\nStep one.\n\nUse @&(1)x{}.');
    expect(at(recipe.ingredients, 0).relation).toEqual({ type: 'reference', referencesTo: 1, referenceTarget: 'step' });
  });

  test('section', () => {
    const { recipe } = parseCooklang('= A\nMake @dough{}.\n\n= B\nUse @&(=1)dough{}.\n');
    expect(at(recipe.ingredients, 1).relation).toEqual({ type: 'reference', referencesTo: 0, referenceTarget: 'section' });
  });

  test('target must come before', () => {
    const { recipe, errors } = parseCooklang('Use @&(5)dough{}.');
    expect(errors.map(e => e.message)).toEqual([
      'Invalid intermediate preparation reference: step 5 does not come before this one',
    ]);
    expect(at(recipe.ingredients, 0).relation.type).toBe('definition');
  });

  test('needs the reference modifier', () => {
    const { recipe, errors } = parseCooklang('Mix @flour{}.\n\nKnead @(1)dough{}.');
    expect(errors.map(e => e.message)).toEqual(['Intermediate preparation without a reference']);
    expect(at(recipe.ingredients, 1).relation.type).toBe('definition');
  });

  test('malformed target', () => {
    const { errors } = parseCooklang('Mix @flour{}.\n\nKnead @&(x)dough{}.');
    expect(errors.map(e => e.message)).toEqual([
      'Invalid intermediate preparation reference',
      'Reference not found: dough',
    ]);
  });
});

describe('content helpers', () => {
  test('steps, text and relations', () => {
    const { recipe } = parseCooklang('> intro\n\n@salt{}\n\n@&salt{}');
    const section = at(recipe.sections, 0);
    const [intro, first] = section.content;
    expect(intro && contentText(intro)).toBe('intro');
    expect(intro && contentStep(intro)).toBeUndefined();
    expect(first && contentStep(first)).toEqual({ number: 1, items: [{ type: 'ingredient', index: 0 }] });
    expect(isEmptySection(section)).toBe(false);
    expect(isEmptySection({ name: null, content: [] })).toBe(true);
    expect(referencedFrom(at(recipe.ingredients, 0).relation)).toEqual([1]);
    expect(referencesTo(at(recipe.ingredients, 0).relation)).toBeUndefined();
  });
});
