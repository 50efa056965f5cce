import { describe, expect, it, vi } from 'vitest';
import {
  AbstractFactoryError,
  CyclicDefinitionError,
  ParentResolverError,
  SequenceResetError,
  UnknownAttributeError,
  UnknownStrategyError,
} from '../errors';
import { Strategy } from '../enums';
import { Factory } from '../Factory';
import { StubObject } from '../FactoryOptions';
import {
  containerAttribute,
  lazyAttribute,
  lazyFunction,
  selfAttribute,
  sequence,
  subFactory,
} from '../helpers';
import { SequenceRegistry } from '../sequences';
import { lazy } from '../utils';
import { Admin, Company, Point, User } from './models';

const phone = (n: number) => `123-555-${String(n).padStart(4, '0')}`;

describe('Factory', () => {
  describe('build', () => {
    it('should number consecutive objects from 0', () => {
      const UserFactory = new Factory<User>({
        model: User,
        declarations: { phone: sequence(phone) },
      });

      expect(UserFactory.build().fields.phone).toBe('123-555-0000');
      expect(UserFactory.build().fields.phone).toBe('123-555-0001');
    });

    it('should give every sequence of one call the same number', () => {
      const UserFactory = new Factory<User>({
        model: User,
        declarations: {
          username: sequence((n) => `user${n}`),
          email: sequence((n) => `user${n}@example.com`),
        },
      });

      UserFactory.build();
      expect(UserFactory.build().fields).toEqual({
        username: 'user1',
        email: 'user1@example.com',
      });
    });

    it('should let call-time values replace declarations', () => {
      const UserFactory = new Factory<User>({
        model: User,
        declarations: { firstName: 'John', phone: sequence(phone) },
      });

      const user = UserFactory.build({ firstName: 'Jane', phone: 'unlisted' });

      expect(user.fields).toEqual({ firstName: 'Jane', phone: 'unlisted' });
    });

    it('should accept attributes nothing declares', () => {
      const UserFactory = new Factory<User>({
        model: User,
        declarations: { firstName: 'John' },
      });

      expect(UserFactory.build({ nickname: 'jj' }).fields).toEqual({
        firstName: 'John',
        nickname: 'jj',
      });
    });

    it('should resolve lazy attributes from their siblings', () => {
      const UserFactory = new Factory<User>({
        model: User,
        declarations: {
          email: lazyAttribute((o) => `${o.get('username')}@example.com`),
          username: 'john',
          token: lazyFunction(() => 'test-token'),
        },
      });

      expect(UserFactory.build({ username: 'jane' }).fields).toEqual({
        email: 'jane@example.com',
        username: 'jane',
        token: 'test-token',
      });
    });

    it('should evaluate each declaration once per call', () => {
      const counter = vi.fn(() => 'value');
      const UserFactory = new Factory<User>({
        model: User,
        declarations: {
          base: lazyFunction(counter),
          first: selfAttribute('base'),
          second: selfAttribute('base'),
        },
      });

      UserFactory.build();

      expect(counter).toHaveBeenCalledTimes(1);
    });

    it('should detect cyclic definitions', () => {
      const LoopFactory = new Factory<User>({
        model: User,
        declarations: {
          a: lazyAttribute((o) => o.get('b')),
          b: lazyAttribute((o) => o.get('a')),
        },
      });

      expect(() => LoopFactory.build()).toThrow(CyclicDefinitionError);
    });

    it('should reject unknown attributes', () => {
      const UserFactory = new Factory<User>({
        model: User,
        declarations: { email: lazyAttribute((o) => o.get('missing')) },
      });

      expect(() => UserFactory.build()).toThrow(UnknownAttributeError);
    });

    it('should let a model constructor error through', () => {
      class Broken {
        constructor() {
          throw new Error('constructor failed');
        }
      }
      const BrokenFactory = new Factory<Broken>({ model: Broken });

      expect(() => BrokenFactory.build()).toThrow('constructor failed');
    });

    it('should resolve a lazy model on first use', () => {
      const UserFactory = new Factory<User>({
        model: lazy(() => User),
        declarations: { firstName: 'John' },
      });

      expect(UserFactory.build()).toBeInstanceOf(User);
    });
  });

  describe('subFactory', () => {
    const makeFactories = () => {
      const UserFactory = new Factory<User>({
        model: User,
        declarations: { firstName: 'John', lastName: 'Doe' },
      });
      const CompanyFactory = new Factory<Company>({
        model: Company,
        declarations: {
          name: 'Acme',
          owner: subFactory(UserFactory, { firstName: 'Jack' }),
        },
      });
      return { UserFactory, CompanyFactory };
    };

    it('should apply the sub-factory defaults', () => {
      const { CompanyFactory } = makeFactories();

      const company = CompanyFactory.build();

      expect(company.fields.owner).toEqual(
        new User({ firstName: 'Jack', lastName: 'Doe' }),
      );
    });

    it('should route deep overrides to the nested object', () => {
      const { CompanyFactory } = makeFactories();

      const company = CompanyFactory.build({ owner__firstName: 'Henry' });

      expect(company.fields.owner).toEqual(
        new User({ firstName: 'Henry', lastName: 'Doe' }),
      );
      expect(Object.keys(company.fields)).toEqual(['name', 'owner']);
    });

    it('should propagate the strategy', () => {
      const { CompanyFactory } = makeFactories();

      const created = CompanyFactory.create();
      const stubbed = CompanyFactory.stub();

      expect(created.fields.owner).toBeInstanceOf(User);
      expect(created.fields.owner).toMatchObject({ saves: 1 });
      expect(stubbed.owner).toBeInstanceOf(StubObject);
    });

    it('should reach the enclosing object through `..`', () => {
      const UserFactory = new Factory<User>({
        model: User,
        declarations: {
          employer: selfAttribute('..name', 'freelance'),
          parentName: lazyAttribute((o) => o.parent?.get('name')),
        },
      });
      const CompanyFactory = new Factory<Company>({
        model: Company,
        declarations: { name: 'Acme', owner: subFactory(UserFactory) },
      });

      const company = CompanyFactory.build();

      expect(company.fields.owner).toEqual(
        new User({ employer: 'Acme', parentName: 'Acme' }),
      );
    });

    it('should refuse to climb above the outermost object', () => {
      const UserFactory = new Factory<User>({
        model: User,
        declarations: { employer: selfAttribute('..name') },
      });

      expect(() => UserFactory.build()).toThrow(ParentResolverError);
    });

    it('should accept a thunk for factories defined later', () => {
      const CompanyFactory = new Factory<Company>({
        model: Company,
        declarations: { owner: subFactory(() => UserFactory) },
      });
      const UserFactory = new Factory<User>({
        model: User,
        declarations: { firstName: 'John' },
      });

      expect(CompanyFactory.build().fields.owner).toEqual(
        new User({ firstName: 'John' }),
      );
    });

    it('should hand container attributes the enclosing resolvers', () => {
      const UserFactory = new Factory<User>({
        model: User,
        declarations: {
          employer: containerAttribute((_o, containers) => containers[0].get('name')),
        },
      });
      const CompanyFactory = new Factory<Company>({
        model: Company,
        declarations: { name: 'Initech', owner: subFactory(UserFactory) },
      });

      expect(CompanyFactory.build().fields.owner).toEqual(
        new User({ employer: 'Initech' }),
      );
      expect(() => UserFactory.build()).toThrow(ParentResolverError);
    });

    it('should run lenient container attributes at the top level', () => {
      const UserFactory = new Factory<User>({
        model: User,
        declarations: {
          depth: containerAttribute((_o, containers) => containers.length, {
            strict: false,
          }),
        },
      });

      expect(UserFactory.build().fields.depth).toBe(0);
    });
  });

  describe('strategies', () => {
    const UserFactory = new Factory<User>({
      model: User,
      declarations: { firstName: 'John' },
    });

    it('should build without saving', () => {
      expect(UserFactory.build().saves).toBe(0);
    });

    it('should call save() when creating', () => {
      expect(UserFactory.create().saves).toBe(1);
    });

    it('should stub without touching the model', () => {
      const stub = UserFactory.stub({ lastName: 'Doe' });

      expect(stub).toBeInstanceOf(StubObject);
      expect(stub).not.toBeInstanceOf(User);
      expect({ ...stub }).toEqual({ firstName: 'John', lastName: 'Doe' });
    });

    it('should follow the default strategy in make()', () => {
      const StubFactory = UserFactory.extend({ strategy: Strategy.Stub });

      expect(UserFactory.make()).toBeInstanceOf(User);
      expect(StubFactory.make()).toBeInstanceOf(StubObject);
    });

    it('should dispatch generate() and simpleGenerate()', () => {
      expect(UserFactory.generate(Strategy.Create)).toMatchObject({ saves: 1 });
      expect(UserFactory.generate(Strategy.Stub)).toBeInstanceOf(StubObject);
      expect(UserFactory.simpleGenerate(true).saves).toBe(1);
      expect(UserFactory.simpleGenerate(false).saves).toBe(0);
    });

    it('should reject unknown strategies', () => {
      expect(() => Reflect.apply(UserFactory.generate, UserFactory, ['fuzzy'])).toThrow(
        UnknownStrategyError,
      );
    });

    it('should use the construct and persist hooks', () => {
      const stored: User[] = [];
      const HookedFactory = new Factory<User>({
        model: User,
        declarations: { firstName: 'John' },
        construct: ({ kwargs }) => new User({ ...kwargs, built: true }),
        persist: (target) => {
          const user = target.build();
          if (user instanceof User) {
            stored.push(user);
          }
          return new User({ id: stored.length });
        },
      });

      expect(HookedFactory.build().fields).toEqual({ firstName: 'John', built: true });
      expect(HookedFactory.create().fields).toEqual({ id: 1 });
      expect(stored[0].fields).toEqual({ firstName: 'John', built: true });
    });

    it('should inherit hooks through extend()', () => {
      const BaseFactory = new Factory<User>({
        model: User,
        adjustKwargs: (kwargs) => ({ ...kwargs, adjusted: true }),
      });
      const ChildFactory = BaseFactory.extend({ declarations: { firstName: 'Jo' } });

      expect(ChildFactory.build().fields).toEqual({ firstName: 'Jo', adjusted: true });
    });
  });

  describe('arguments', () => {
    it('should pass inline arguments positionally', () => {
      const PointFactory = new Factory<Point>({
        model: Point,
        declarations: { x: 1, y: 2, label: 'origin', scratch: 5 },
        inlineArgs: ['x', 'y'],
        exclude: ['scratch'],
        rename: { label: 'name' },
      });

      const point = PointFactory.build();

      expect(point).toEqual(new Point(1, 2, { name: 'origin' }));
    });

    it('should omit keyword arguments when only inline ones remain', () => {
      const PointFactory = new Factory<Point>({
        model: Point,
        declarations: { x: 3, y: 4 },
        inlineArgs: ['x', 'y'],
      });

      expect(PointFactory.build().options).toBeUndefined();
    });

    it('should keep excluded attributes readable by others', () => {
      const UserFactory = new Factory<User>({
        model: User,
        declarations: {
          domain: 'example.com',
          email: lazyAttribute((o) => `john@${o.get('domain')}`),
        },
        exclude: ['domain'],
      });

      expect(UserFactory.build().fields).toEqual({ email: 'john@example.com' });
    });
  });

  describe('abstract factories', () => {
    it('should refuse to generate from an abstract factory', () => {
      const BaseFactory = new Factory<User>({
        abstract: true,
        declarations: { firstName: 'John' },
      });

      expect(() => BaseFactory.build()).toThrow(AbstractFactoryError);
      expect(() => BaseFactory.stub()).toThrow(AbstractFactoryError);
    });

    it('should make a child with a model concrete', () => {
      const BaseFactory = new Factory<User>({
        abstract: true,
        declarations: { firstName: 'John' },
      });

      const user = BaseFactory.extend<User>({ model: User }).build();

      expect(user.fields).toEqual({ firstName: 'John' });
    });

    it('should stub but not build without a model', () => {
      const BagFactory = new Factory({ declarations: { firstName: 'John' } });

      expect({ ...BagFactory.stub() }).toEqual({ firstName: 'John' });
      expect(() => BagFactory.build()).toThrow(AbstractFactoryError);
    });
  });

  describe('resetSequence', () => {
    const makeFactory = () =>
      new Factory<User>({
        model: User,
        declarations: { n: sequence((n) => n) },
        sequences: new SequenceRegistry(),
      });

    it('should restart from the given value', () => {
      const UserFactory = makeFactory();
      UserFactory.build();
      UserFactory.build();

      UserFactory.resetSequence(10);

      expect(UserFactory.build().fields.n).toBe(10);
      expect(UserFactory.build().fields.n).toBe(11);
    });

    it('should restart from the initial value by default', () => {
      const UserFactory = makeFactory();
      UserFactory.build();

      UserFactory.resetSequence();

      expect(UserFactory.build().fields.n).toBe(0);
    });

    it('should start from setupNextSequence()', () => {
      const UserFactory = new Factory<User>({
        model: User,
        declarations: { n: sequence((n) => n) },
        setupNextSequence: () => 100,
      });

      expect(UserFactory.build().fields.n).toBe(100);
    });

    it('should share the counter with children of the same model', () => {
      const UserFactory = makeFactory();
      const ChildFactory = UserFactory.extend({ declarations: { child: true } });
      const AdminFactory = UserFactory.extend<Admin>({ model: Admin });

      expect(UserFactory.build().fields.n).toBe(0);
      expect(ChildFactory.build().fields.n).toBe(1);
      expect(AdminFactory.build().fields.n).toBe(2);
      expect(UserFactory.build().fields.n).toBe(3);
    });

    it('should give an unrelated model its own counter', () => {
      const UserFactory = makeFactory();
      const CompanyFactory = UserFactory.extend<Company>({ model: Company });

      UserFactory.build();

      expect(CompanyFactory.build().fields.n).toBe(0);
    });

    it('should refuse to reset from a child unless forced', () => {
      const UserFactory = makeFactory();
      const ChildFactory = UserFactory.extend({});
      UserFactory.build();

      expect(() => ChildFactory.resetSequence(5)).toThrow(SequenceResetError);

      ChildFactory.resetSequence(5, { force: true });

      expect(UserFactory.build().fields.n).toBe(5);
    });

    it('should force a number without moving the counter', () => {
      const UserFactory = makeFactory();

      expect(UserFactory.build({ __sequence: 42 }).fields.n).toBe(42);
      expect(UserFactory.build().fields.n).toBe(0);
    });
  });

  describe('batches', () => {
    it('should generate each object with its own number', () => {
      const UserFactory = new Factory<User>({
        model: User,
        declarations: { phone: sequence(phone) },
      });

      const phones = UserFactory.buildBatch(3).map((user) => user.fields.phone);

      expect(phones).toEqual(['123-555-0000', '123-555-0001', '123-555-0002']);
    });

    it('should compute overrides from the index', () => {
      const UserFactory = new Factory<User>({ model: User });

      const users = UserFactory.createBatch(2, (index) => ({ rank: index * 10 }));

      expect(users.map((user) => user.fields.rank)).toEqual([0, 10]);
      expect(users.map((user) => user.saves)).toEqual([1, 1]);
    });

    it('should cover every strategy', () => {
      const UserFactory = new Factory<User>({ model: User });

      expect(UserFactory.stubBatch(2)).toHaveLength(2);
      expect(UserFactory.makeBatch(1)[0]).toBeInstanceOf(User);
      expect(UserFactory.generateBatch(Strategy.Stub, 1)[0]).toBeInstanceOf(StubObject);
      expect(UserFactory.simpleGenerateBatch(true, 2).map((u) => u.saves)).toEqual([1, 1]);
    });
  });
});
