import { describe, expect, test } from 'vitest';
import {
  Converter,
  convertQuantity,
  convertRecipe,
  defaultScale,
  groupAmounts,
  groupIngredients,
  groupQuantities,
  parseCooklang,
  totalQuantity,
} from '../src/index';
import { at, num, text } from './helpers';

const converter = Converter.bundled();

const scaled = (source: string) => defaultScale(parseCooklang(source).recipe);

describe('Converter', () => {
  test('finds units by symbol, name or alias', () => {
    expect(converter.findUnit('kg')?.physicalQuantity).toBe('mass');
    expect(converter.findUnit('Grams')?.symbols).toEqual(['g']);
    expect(converter.findUnit('tbs')?.names).toEqual(['tablespoon', 'tablespoons']);
    expect(converter.findUnit('handful')).toBeNull();
    expect(Converter.empty().findUnit('g')).toBeNull();
  });

  test('conversion factors', () => {
    expect(converter.conversionFactor('kg', 'g')).toBe(1000);
    expect(converter.conversionFactor('kg', 'ml')).toBeNull();
    expect(converter.conversionFactor('°C', '°F')).toBeNull();
    expect(converter.isCompatible('cup', 'ml')).toBe(true);
  });

  test('temperatures use the offset', () => {
    const celsius = converter.findUnit('°C');
    const fahrenheit = converter.findUnit('°F');
    if (!celsius || !fahrenheit) throw new Error('missing temperature units');
    expect(converter.convertNumber(100, celsius, fahrenheit)).toBeCloseTo(212);
    expect(converter.convertNumber(32, fahrenheit, celsius)).toBeCloseTo(0);
  });

  test('best unit in the unit system or another one', () => {
    const grams = converter.findUnit('g');
    if (!grams) throw new Error('missing grams');
    expect(converter.bestUnit(1000, grams).symbols).toEqual(['kg']);
    expect(converter.bestUnit(1000, grams, 'imperial').symbols).toEqual(['lb']);
    expect(converter.bestUnit(0.5, grams, 'imperial').symbols).toEqual(['oz']);
  });

  test('rejects invalid tables', () => {
    expect(() => Converter.fromConfig({ quantities: 'none' })).toThrow();
    expect(() =>
      Converter.fromConfig({
        quantities: [
          {
            quantity: 'mass',
            units: [
              { names: ['gram'], symbols: ['g'], ratio: 1 },
              { names: ['grain'], symbols: ['g'], ratio: 0.0648 },
            ],
          },
        ],
      }),
    ).toThrow("Duplicate unit name: 'g'");
  });

  test('custom tables', () => {
    const custom = Converter.fromConfig({
      quantities: [{ quantity: 'volume', units: [{ names: ['drop'], ratio: 0.00005 }] }],
    });
    expect(custom.defaultSystem()).toBe('metric');
    expect(custom.findUnit('drops')).toBeNull();
    expect(custom.findUnit('DROP')?.physicalQuantity).toBe('volume');
  });
});

describe('convertQuantity', () => {
  test('to a system picks the best unit', () => {
    const result = convertQuantity({ value: num(1), unit: 'kg' }, 'imperial', converter);
    expect(result).toMatchObject({
      ok: true,
      value: { value: { type: 'number', value: { type: 'fraction', value: { whole: 2, num: 1, den: 4 } } }, unit: 'lb' },
    });
  });

  test('to a unit', () => {
    const grams = converter.findUnit('g');
    if (!grams) throw new Error('missing grams');
    expect(convertQuantity({ value: num(1.5), unit: 'kg' }, grams, converter)).toEqual({
      ok: true,
      value: { value: num(1500), unit: 'g' },
    });
  });

  test('a system without units for the quantity keeps it', () => {
    const custom = Converter.fromConfig({
      quantities: [{ quantity: 'volume', units: [{ names: ['drop'], ratio: 0.00005, system: 'metric' }] }],
    });
    const quantity = { value: num(3), unit: 'drop' };
    expect(convertQuantity(quantity, 'imperial', custom)).toEqual({ ok: true, value: quantity });
  });

  test('time has no system', () => {
    const quantity = { value: num(20), unit: 'min' };
    expect(convertQuantity(quantity, 'imperial', converter)).toEqual({ ok: true, value: quantity });
  });

  test('errors', () => {
    expect(convertQuantity({ value: text('some'), unit: 'g' }, 'imperial', converter)).toEqual({
      ok: false,
      error: { type: 'textValue', value: 'some' },
    });
    expect(convertQuantity({ value: num(1), unit: null }, 'imperial', converter)).toEqual({
      ok: false,
      error: { type: 'missingUnit' },
    });
    expect(convertQuantity({ value: num(1), unit: 'handful' }, 'imperial', converter)).toEqual({
      ok: false,
      error: { type: 'unknownUnit', unit: 'handful' },
    });
    const litre = converter.findUnit('l');
    if (!litre) throw new Error('missing litre');
    expect(convertQuantity({ value: num(1), unit: 'kg' }, litre, converter)).toEqual({
      ok: false,
      error: { type: 'mixedQuantities', from: 'mass', to: 'volume' },
    });
  });

  test('recipe', () => {
    const { recipe, errors } = convertRecipe(
      scaled('Mix @flour{1%kg}, @milk{500%ml} and @salt{1%handful}.'),
      'imperial',
      converter,
    );
    expect(recipe.ingredients.map(i => i.quantity?.unit)).toEqual(['lb', 'c', 'handful']);
    expect(errors).toEqual([{ type: 'unknownUnit', unit: 'handful' }]);
  });
});

describe('grouping', () => {
  test('ingredient quantities are added and fitted', () => {
    const recipe = scaled('@flour{1000%g} @&flour{100%g}');
    const flour = at(recipe.ingredients, 0);

    expect(groupQuantities(flour, recipe.ingredients, converter).total()).toEqual({
      type: 'single',
      quantity: { value: num(1.1), unit: 'kg' },
    });
    expect(totalQuantity(flour, recipe.ingredients, converter)).toEqual({
      ok: true,
      value: { value: num(1.1), unit: 'kg' },
    });
  });

  test('incompatible units stay apart', () => {
    const recipe = scaled('@salt{1%g} @&salt{1%pinch}');
    const salt = at(recipe.ingredients, 0);

    expect(groupQuantities(salt, recipe.ingredients, converter).total()).toEqual({
      type: 'many',
      quantities: [
        { value: num(1), unit: 'g' },
        { value: num(1), unit: 'pinch' },
      ],
    });
    expect(totalQuantity(salt, recipe.ingredients, converter)).toEqual({
      ok: false,
      error: { type: 'unknownUnit', unit: 'pinch' },
    });
  });

  test('cookware amounts', () => {
    const recipe = scaled('#pan{3} #&pan{1} #&pan{big}');
    expect(groupAmounts(at(recipe.cookware, 0), recipe.cookware)).toEqual([num(4), text('big')]);
  });

  test('ingredient list has one entry per definition', () => {
    const recipe = scaled('@flour{200%g} @&flour{300%g} @eggs{2}');
    const list = groupIngredients(recipe, converter);
    expect(list.map(e => [e.index, e.ingredient.name])).toEqual([
      [0, 'flour'],
      [2, 'eggs'],
    ]);
    expect(at(list, 0).quantity.total()).toEqual({ type: 'single', quantity: { value: num(500), unit: 'g' } });
  });
});
