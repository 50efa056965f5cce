import { describe, expect, it } from 'vitest';
import { Strategy } from '../enums';
import { DictFactory, Factory, ListFactory } from '../Factory';
import { StubObject } from '../FactoryOptions';
import {
  build,
  buildBatch,
  create,
  createBatch,
  generate,
  generateBatch,
  makeFactory,
  sequence,
  simpleGenerate,
  simpleGenerateBatch,
  stub,
  stubBatch,
} from '../helpers';
import { debug, logger } from '../logger';
import { Admin, User } from './models';

describe('helpers', () => {
  describe('makeFactory', () => {
    it('should build a factory for the model', () => {
      const UserFactory = makeFactory(User, { firstName: 'John' });

      expect(UserFactory.build().fields).toEqual({ firstName: 'John' });
    });

    it('should extend a base factory', () => {
      const UserFactory = new Factory<User>({
        model: User,
        declarations: { firstName: 'John', n: sequence((n) => n) },
      });
      const AdminFactory = makeFactory(Admin, { role: 'admin' }, UserFactory);

      UserFactory.build();
      const admin = AdminFactory.build();

      expect(admin).toBeInstanceOf(Admin);
      expect(admin.fields).toEqual({ firstName: 'John', n: 1, role: 'admin' });
    });
  });

  describe('one-shot generation', () => {
    it('should generate single objects', () => {
      expect(build(User, { a: 1 }).fields).toEqual({ a: 1 });
      expect(create(User, { a: 1 }).saves).toBe(1);
      expect({ ...stub(User, { a: 1 }) }).toEqual({ a: 1 });
      expect(generate(User, Strategy.Stub, { a: 1 })).toBeInstanceOf(StubObject);
      expect(simpleGenerate(User, true).saves).toBe(1);
    });

    it('should generate batches', () => {
      const ids = buildBatch(User, 3, { id: sequence((n) => n) }).map((u) => u.fields.id);

      expect(ids).toEqual([0, 1, 2]);
      expect(createBatch(User, 2).map((u) => u.saves)).toEqual([1, 1]);
      expect(stubBatch(User, 2, {}, (i) => ({ i })).map((s) => s.i)).toEqual([0, 1]);
      expect(generateBatch(User, Strategy.Build, 1)[0]).toBeInstanceOf(User);
      expect(simpleGenerateBatch(User, false, 2).map((u) => u.saves)).toEqual([0, 0]);
    });
  });

  describe('container factories', () => {
    it('should build plain objects and arrays', () => {
      DictFactory.resetSequence(0);
      ListFactory.resetSequence(0);

      expect(DictFactory.build({ id: sequence((n) => n), label: 'x' })).toEqual({
        id: 0,
        label: 'x',
      });
      expect(ListFactory.build({ 1: 'b', 0: sequence((n) => `a${n}`) })).toEqual([
        'a0',
        'b',
      ]);
    });
  });

  describe('debug', () => {
    it('should raise the engine log level while the callback runs', () => {
      const before = logger.level;

      const during = debug(() => logger.level);

      expect(during).toBe('debug');
      expect(logger.level).toBe(before);
    });
  });
});
