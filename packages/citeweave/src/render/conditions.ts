import { isEmptyValue, lookupVariable, variableAsString } from '../model/entry.js';
import type { ChooseBranch, Condition, Position } from '../model/style.js';
import { isNumeric } from '../format/numbers.js';
import type { RenderContext } from './context.js';

export const positionMatches = (actual: Position, nearNote: boolean, tested: Position): boolean => {
  switch (tested) {
    case 'first':
      return actual === 'first';
    case 'subsequent':
      return actual !== 'first';
    case 'ibid':
      return actual === 'ibid' || actual === 'ibid-with-locator';
    case 'ibid-with-locator':
      return actual === 'ibid-with-locator';
    case 'near-note':
      return actual !== 'first' && nearNote;
  }
};

/** Variables that live on the cite or the engine state rather than on the entry. */
const citeVariablePresent = (context: RenderContext, variable: string): boolean | undefined => {
  switch (variable) {
    case 'locator':
      return Boolean(context.cite.locator);
    case 'citation-number':
      return context.cite.citationNumber !== undefined;
    case 'first-reference-note-number':
      return context.cite.firstReferenceNoteNumber !== undefined;
    case 'year-suffix':
      return context.disambiguation.yearSuffix !== undefined && !context.omitYearSuffix;
    default:
      return undefined;
  }
};

export const variablePresent = (context: RenderContext, variable: string): boolean =>
  citeVariablePresent(context, variable) ?? !isEmptyValue(lookupVariable(context.entry, variable));

const variableIsNumeric = (context: RenderContext, variable: string): boolean => {
  if (variable === 'locator') {
    return context.cite.locator !== undefined && isNumeric(context.cite.locator);
  }
  if (variable === 'citation-number') {
    return context.cite.citationNumber !== undefined;
  }

  const value = lookupVariable(context.entry, variable);
  if (value?.kind === 'number') {
    return isNumeric(value.number.value);
  }
  if (value?.kind === 'text') {
    return isNumeric(value.text.value);
  }

  return false;
};

/** Every listed value is a separate test; `match` combines them across the whole branch. */
const conditionResults = (context: RenderContext, condition: Condition): boolean[] => {
  switch (condition.test) {
    case 'type':
      return condition.types.map((type) => context.entry.type === type);
    case 'variable':
      return condition.variables.map((variable) => variablePresent(context, variable));
    case 'is-numeric':
      return condition.variables.map((variable) => variableIsNumeric(context, variable));
    case 'is-uncertain-date':
      return condition.variables.map((variable) => {
        const value = lookupVariable(context.entry, variable);
        return value?.kind === 'date' && value.date.approximate === true;
      });
    case 'locator':
      return condition.labels.map(
        (label) => context.cite.locator !== undefined && (context.cite.label ?? 'page') === label
      );
    case 'position':
      return condition.positions.map(
        (position) =>
          context.mode === 'citation' && positionMatches(context.cite.position, context.cite.nearNote, position)
      );
    case 'disambiguate':
      return [context.disambiguation.conditionFlag];
    case 'value':
      return [variableAsString(lookupVariable(context.entry, condition.variable)) === condition.equals];
  }
};

export const branchMatches = (context: RenderContext, branch: ChooseBranch): boolean => {
  const results = branch.conditions.flatMap((condition) => conditionResults(context, condition));

  switch (branch.match ?? 'all') {
    case 'all':
      return results.every(Boolean);
    case 'any':
      return results.some(Boolean);
    case 'none':
      return !results.some(Boolean);
  }
};
