import assert from 'node:assert/strict';
import test from 'node:test';

import { ChatCoreError } from '../errors.js';
import { buildChatRequest, buildPrompt, createSearchRequest, isTaskKind } from './requestBuilder.js';

function isInvalidArgument(error: unknown): boolean {
  return error instanceof ChatCoreError && error.code === 'INVALID_ARGUMENT';
}

test('property prompt names the query and the exact reply shape', () => {
  const prompt = buildPrompt('  Lakeview Residency, Kondapur  ', 'PROPERTY_FACTS');

  assert.ok(prompt.startsWith('Given the property query: "Lakeview Residency, Kondapur"'));
  assert.ok(prompt.includes('"images": ["image_url_1", "image_url_2"]'));
  assert.ok(prompt.includes('"configuration": "2 BHK"'));
  assert.ok(prompt.includes('"area_sqft": "1286"'));
  assert.ok(prompt.includes('"price_inr": "55.3 Lakh"'));
  assert.ok(prompt.includes('"builder": "builder name"'));
  assert.ok(prompt.includes('"amenities": ["amenity_1", "amenity_2"]'));
});

test('image prompt asks for bare URLs one per line', () => {
  const prompt = buildPrompt('Lakeview Residency', 'IMAGE_SEARCH');

  assert.ok(prompt.startsWith('Find photos of the property: "Lakeview Residency"'));
  assert.ok(prompt.includes('one URL per line'));
  assert.ok(prompt.endsWith('Do not add numbering, labels, markdown or any other text.'));
});

test('prompt building is deterministic', () => {
  assert.equal(buildPrompt('Tower A', 'PROPERTY_FACTS'), buildPrompt('Tower A', 'PROPERTY_FACTS'));
});

test('empty or blank queries fail with INVALID_ARGUMENT', () => {
  assert.throws(() => buildPrompt('', 'PROPERTY_FACTS'), isInvalidArgument);
  assert.throws(() => buildPrompt('   \n', 'IMAGE_SEARCH'), isInvalidArgument);
});

test('createSearchRequest trims and freezes its input', () => {
  const request = createSearchRequest({ query: ' Tower A ', model: ' sonar ', taskKind: 'IMAGE_SEARCH' });

  assert.deepEqual(request, { query: 'Tower A', model: 'sonar', taskKind: 'IMAGE_SEARCH' });
  assert.ok(Object.isFrozen(request));
});

test('createSearchRequest rejects an empty model', () => {
  assert.throws(
    () => createSearchRequest({ query: 'Tower A', model: ' ', taskKind: 'PROPERTY_FACTS' }),
    /model must not be empty/,
  );
});

test('buildChatRequest applies per-task sampling defaults', () => {
  const facts = buildChatRequest(createSearchRequest({ query: 'Tower A', model: 'sonar', taskKind: 'PROPERTY_FACTS' }));
  const images = buildChatRequest(
    createSearchRequest({ query: 'Tower A', model: 'sonar-pro', taskKind: 'IMAGE_SEARCH' }),
    { temperature: 0 },
  );

  assert.equal(facts.model, 'sonar');
  assert.equal(facts.temperature, 0.2);
  assert.equal(facts.maxTokens, 1024);
  assert.equal(facts.prompt, buildPrompt('Tower A', 'PROPERTY_FACTS'));
  assert.equal(images.model, 'sonar-pro');
  assert.equal(images.temperature, 0);
  assert.equal(images.maxTokens, 512);
});

test('isTaskKind recognizes only the supported task kinds', () => {
  assert.equal(isTaskKind('PROPERTY_FACTS'), true);
  assert.equal(isTaskKind('IMAGE_SEARCH'), true);
  assert.equal(isTaskKind('image_search'), false);
  assert.equal(isTaskKind(undefined), false);
});
