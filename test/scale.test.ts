import { describe, expect, test } from 'vitest';
import { defaultScale, parseCooklang, scale } from '../src/index';
import { at, frac, num, text } from './helpers';

const parse = (source: string) => parseCooklang(source).recipe;

describe('scale', () => {
  test('linear, fixed and missing quantities', () => {
    const recipe = parse('---\nservings: 2\n---\nMix @flour{100*%g}, @salt{1%pinch} and @eggs{}.\n');
    const scaled = scale(recipe, 4);

    expect(scaled.ingredients.map(i => i.quantity)).toEqual([
      { value: num(200), unit: 'g' },
      { value: num(1), unit: 'pinch' },
      null,
    ]);
    expect(scaled.data).toEqual({
      type: 'scaled',
      target: { base: 2, target: 4, index: null },
      ingredients: ['scaled', 'fixed', 'noQuantity'],
      cookware: [],
      timers: [],
    });
  });

  test('values per servings', () => {
    const recipe = parse('---\nservings: 2|4|8\n---\n@water{1|2|3%l}\n');

    const four = scale(recipe, 4);
    expect(at(four.ingredients, 0).quantity).toEqual({ value: num(2), unit: 'l' });
    expect(four.data).toMatchObject({ target: { base: 2, target: 4, index: 1 }, ingredients: ['scaled'] });

    const three = scale(recipe, 3);
    expect(at(three.ingredients, 0).quantity).toEqual({ value: num(1), unit: 'l' });
    expect(three.data).toMatchObject({ target: { index: null }, ingredients: ['error'] });
  });

  test('text cannot be scaled', () => {
    const scaled = scale(parse('@salt{some*}'), 3);
    expect(at(scaled.ingredients, 0).quantity).toEqual({ value: text('some'), unit: null });
    expect(scaled.data).toMatchObject({ target: { base: 1, target: 3 }, ingredients: ['error'] });
  });

  test('fractions stay fractions', () => {
    const scaled = scale(parse('---\nservings: 2\n---\n@sugar{1/2*%cup}'), 6);
    expect(at(scaled.ingredients, 0).quantity).toEqual({ value: { type: 'number', value: frac(1, 1, 2) }, unit: 'cup' });
  });

  test('ranges scale both ends', () => {
    const scaled = scale(parse('@milk{1-2*%cup}'), 2);
    expect(at(scaled.ingredients, 0).quantity?.value).toEqual({
      type: 'range',
      value: { start: { type: 'regular', value: 2 }, end: { type: 'regular', value: 4 } },
    });
  });

  test('cookware and timers', () => {
    const scaled = scale(parse('Use #pan{2*} for ~{10*%min}.'), 2);
    expect(at(scaled.cookware, 0).quantity).toEqual(num(4));
    expect(at(scaled.timers, 0).quantity).toEqual({ value: num(20), unit: 'min' });
    expect(scaled.data).toMatchObject({ cookware: ['scaled'], timers: ['scaled'] });
  });
});

describe('scaled copies', () => {
  test('references and metadata are not shared with the source recipe', () => {
    const recipe = parse('---\ntags: [quick]\n---\nMix @flour{100*%g} and @&flour{50*%g}.');
    const scaled = scale(recipe, 2);

    const flour = at(scaled.ingredients, 0);
    if (flour.relation.type !== 'definition') throw new Error('expected a definition');
    flour.relation.referencedFrom.push(5);
    expect(flour.relation.referencedFrom).toEqual([1, 5]);
    expect(at(recipe.ingredients, 0).relation).toEqual({ type: 'definition', referencedFrom: [1], definedInStep: true });

    scaled.metadata.title = 'Bread';
    expect(recipe.metadata).toEqual({ tags: ['quick'] });
    expect(scaled.metadata.tags).toEqual(['quick']);
    expect(scaled.metadata.tags).not.toBe(recipe.metadata.tags);

    expect(scaled.sections).toEqual(recipe.sections);
    expect(scaled.sections[0]).not.toBe(recipe.sections[0]);
  });
});

describe('defaultScale', () => {
  test('takes the first value of each quantity', () => {
    const scaled = defaultScale(parse('---\nservings: 2|4\n---\n@water{1|2%l} and @salt{3*%g}'));
    expect(scaled.ingredients.map(i => i.quantity)).toEqual([
      { value: num(1), unit: 'l' },
      { value: num(3), unit: 'g' },
    ]);
    expect(scaled.data).toEqual({ type: 'defaultScaling' });
  });
});
