/**
 * Getting Started with criteria-sql
 *
 * Declares a small schema, composes a few queries against it and prints the
 * rendered SQL for both dialects.
 * Run with: npx tsx examples/basic/01-getting-started.ts
 */

import {
  CriteriaBuilder,
  FieldNotFoundError,
  ValidationError,
  createConsoleLogger,
  defineEntity,
  metadataResolver,
} from '@criteria-sql/core';

const Auditable = defineEntity('Auditable', {
  fields: { id: {}, createdAt: {}, updatedAt: {} },
});

const Author = defineEntity('Author', {
  extends: Auditable,
  fields: { penName: { column: 'pen_name' }, country: {} },
});

const Book = defineEntity('Book', {
  table: 'catalog.books',
  extends: Auditable,
  fields: { authorId: {}, title: {}, publishedOn: {}, price: {} },
});

function basicSelect() {
  console.log('\n=== Basic SELECT ===');

  const cb = new CriteriaBuilder();
  const book = cb.declareFrom(Book);

  const sql = cb
    .query()
    .select(cb.select(book))
    .where(cb.greaterThan(book.column('price'), 20))
    .orderBy(cb.asc(book.column('title')))
    .limit(10)
    .render();

  console.log(sql);
}

function joinedProjection() {
  console.log('\n=== JOIN with projection ===');

  const cb = new CriteriaBuilder({ dialect: 'mysql', logger: createConsoleLogger() });
  const book = cb.declareFrom(Book);
  const author = cb.declareJoin(Author, book.column('authorId'), 'id', 'LEFT');

  const sql = cb
    .query()
    .select(
      cb.multiSelect(
        book.column('title'),
        cb.concat(author.column('penName'), ' / ', author.column('country')).as('byline'),
        book.formatDate('publishedOn', '%Y', 'year'),
      ),
    )
    .where(
      cb.and(
        cb.like(cb.lower(book.column('title')), 'rust', 'START'),
        cb.or(cb.isNull(author.column('country')), cb.notIn(author.column('country'), ['FR', 'DE'])),
      ),
    )
    .orderBy([cb.desc(book.column('publishedOn')), cb.asc(book.column('title'))])
    .limit(25)
    .offset(50)
    .render();

  console.log(sql);
}

function aggregates() {
  console.log('\n=== COUNT + GROUP BY ===');

  const cb = new CriteriaBuilder();
  const book = cb.declareFrom(Book);

  const sql = cb
    .query()
    .select(cb.multiSelect(book.column('authorId'), book.count('id', 'books')))
    .groupBy(book.column('authorId'))
    .render();

  console.log(sql);
}

function distinctOn() {
  console.log('\n=== DISTINCT ON (PostgreSQL) ===');

  const cb = new CriteriaBuilder({ dialect: 'postgresql' });
  const book = cb.declareFrom(Book);

  const sql = cb
    .query()
    .select(cb.select(book))
    .distinctOn(cb.selectDistinctOn(book.column('authorId')))
    .orderBy(cb.asc(book.column('authorId')), cb.desc(book.column('publishedOn')))
    .render();

  console.log(sql);
}

function errors() {
  console.log('\n=== Errors ===');

  const cb = new CriteriaBuilder();
  const book = cb.declareFrom(Book);

  try {
    cb.in(book.column('id'), []);
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    console.log(`${error.code}: ${error.message}`);
  }

  try {
    // e.g. a sort field taken from a request
    const requested: string = 'isbn';
    metadataResolver.resolveColumn(Book, requested);
  } catch (error) {
    if (!(error instanceof FieldNotFoundError)) throw error;
    console.log(`${error.code}: ${error.message}`);
  }
}

basicSelect();
joinedProjection();
aggregates();
distinctOn();
errors();

console.log('\nResolver statistics:', metadataResolver.getStatistics());
