import assert from 'node:assert/strict';
import test from 'node:test';

import { ChatCoreError } from '../errors.js';
import { extractImageUrls, isImageUrl } from './imageUrlScan.js';

test('finds bare URLs in running text in order', () => {
  assert.deepEqual(extractImageUrls('See https://x.com/a.jpg and https://x.com/b.PNG', 0), [
    'https://x.com/a.jpg',
    'https://x.com/b.PNG',
  ]);
});

test('never returns duplicates', () => {
  const reply = 'https://x.com/a.jpg\nagain https://x.com/a.jpg\nand once more https://x.com/a.jpg';

  assert.deepEqual(extractImageUrls(reply), ['https://x.com/a.jpg']);
});

test('matches labeled URLs on their own lines', () => {
  const reply = [
    'Exterior',
    'URL: https://images.example.com/projects/tower/exterior.jpeg',
    'Image URL: http://images.example.com/projects/tower/floor-plan.webp',
  ].join('\n');

  assert.deepEqual(extractImageUrls(reply), [
    'https://images.example.com/projects/tower/exterior.jpeg',
    'http://images.example.com/projects/tower/floor-plan.webp',
  ]);
});

test('keeps query strings after the extension', () => {
  assert.deepEqual(extractImageUrls('thumb: https://cdn.example.com/p/1.png?w=640&h=480 done'), [
    'https://cdn.example.com/p/1.png?w=640&h=480',
  ]);
});

test('anchors the extension on the end of the path', () => {
  const reply = [
    'https://x.com/gallery.jpg/view',
    'https://x.com/photo.jpg.html',
    'https://x.com/page?img=cover.jpg',
    'https://x.com/listing',
  ].join(' ');

  assert.deepEqual(extractImageUrls(reply), []);
});

test('drops markdown and sentence punctuation around the URL', () => {
  const reply =
    'Photos: ![lobby](https://x.com/lobby.gif), [pool](https://x.com/pool.jpg?v=2). Also "https://x.com/gym.png".';

  assert.deepEqual(extractImageUrls(reply), [
    'https://x.com/lobby.gif',
    'https://x.com/pool.jpg?v=2',
    'https://x.com/gym.png',
  ]);
});

test('reads markdown links whose label is the URL itself', () => {
  const reply =
    'See [https://x.com/a.jpg](https://x.com/a.jpg) now and [https://x.com/b.png?w=1](https://x.com/b.png?w=1).';

  assert.deepEqual(extractImageUrls(reply), ['https://x.com/a.jpg', 'https://x.com/b.png?w=1']);
});

test('stops at angle brackets and quotes', () => {
  assert.deepEqual(extractImageUrls('<img src=\'https://x.com/a.webp\'><https://x.com/b.gif>'), [
    'https://x.com/a.webp',
    'https://x.com/b.gif',
  ]);
});

test('truncates to maxResults', () => {
  const reply = 'https://x.com/1.jpg https://x.com/2.jpg https://x.com/1.jpg https://x.com/3.jpg';

  assert.deepEqual(extractImageUrls(reply, 2), ['https://x.com/1.jpg', 'https://x.com/2.jpg']);
});

test('returns an empty list when nothing matches', () => {
  assert.deepEqual(extractImageUrls('No images are available for this listing.'), []);
  assert.deepEqual(extractImageUrls(''), []);
});

test('rejects negative or fractional maxResults', () => {
  assert.throws(
    () => extractImageUrls('https://x.com/a.jpg', -1),
    (error: unknown) => error instanceof ChatCoreError && error.code === 'INVALID_ARGUMENT',
  );
  assert.throws(() => extractImageUrls('https://x.com/a.jpg', 1.5), ChatCoreError);
});

test('isImageUrl accepts exactly one image URL', () => {
  assert.equal(isImageUrl(' https://x.com/a.jpeg '), true);
  assert.equal(isImageUrl('https://x.com/a.jpeg extra'), false);
  assert.equal(isImageUrl('ftp://x.com/a.jpeg'), false);
});
