/**
 * CustomHandlerFactory tests.
 *
 * Verifies:
 * - Direct mappings take precedence in all three categories
 * - Misses delegate to the base chain unchanged
 * - Mixin overlays reach introspection
 * - withExtension() copies without touching the original
 * - Subclasses without their own copy strategy fail fast
 * - Concurrent readers see the sequential results
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { createReaderConfig } from '../../../src/config/index.js';
import { FactoryConfigurationError, HandlerCreationError } from '../../../src/errors.js';
import { BasicHandlerFactory } from '../../../src/factory/basic-factory.js';
import {
  type CustomFactoryState,
  CustomHandlerFactory,
} from '../../../src/factory/custom-factory.js';
import { RecordHandler } from '../../../src/handlers/record-handler.js';
import type { ValueHandler } from '../../../src/handlers/types.js';
import { StdHandlerProvider } from '../../../src/provider/std-provider.js';
import type { ExtensionList, HandlerExtension } from '../../../src/registry/extensions.js';
import {
  arrayType,
  enumType,
  keyOf,
  recordType,
  scalarTypes,
} from '../../../src/types/index.js';
import {
  AccountType,
  ColorType,
  compactMoneyHandler,
  constantHandler,
  EntityType,
  type Money,
  MoneyType,
  PriceType,
} from '../../fixtures/types.js';

const config = createReaderConfig();

/** Extension that answers every category with the same handler */
function answeringExtension(handler: ValueHandler): HandlerExtension {
  return {
    findRecordHandler: () => handler,
    findArrayHandler: () => handler,
    findEnumHandler: () => handler,
  };
}

/** Extension that only answers for Price */
function priceExtension(handler: ValueHandler): HandlerExtension {
  return {
    findRecordHandler: (type) => (keyOf(type).equals(keyOf(PriceType)) ? handler : null),
  };
}

class TenantFactory extends CustomHandlerFactory {
  readonly tenant: string;

  constructor(tenant: string, state?: Partial<CustomFactoryState>) {
    super(state);
    this.tenant = tenant;
  }
}

class AuditedFactory extends CustomHandlerFactory {
  readonly auditLabel: string;

  constructor(auditLabel: string, state?: Partial<CustomFactoryState>) {
    super(state);
    this.auditLabel = auditLabel;
  }

  protected copyWith(extensions: ExtensionList): AuditedFactory {
    return new AuditedFactory(this.auditLabel, this.snapshotState(extensions));
  }
}

class StrictAuditedFactory extends AuditedFactory {}

describe('CustomHandlerFactory', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('override precedence', () => {
    it('returns the registered record handler', () => {
      const factory = new CustomHandlerFactory();
      const provider = new StdHandlerProvider(factory);
      factory.register(MoneyType, compactMoneyHandler);

      expect(factory.createRecordHandler(config, MoneyType, provider)).toBe(compactMoneyHandler);
    });

    it('returns the registered array handler', () => {
      const factory = new CustomHandlerFactory();
      const provider = new StdHandlerProvider(factory);
      const moneyList = arrayType(MoneyType);
      const listHandler = constantHandler<Money[]>([], 'billing.Money[]');
      factory.register(moneyList, listHandler);

      expect(factory.createArrayHandler(config, moneyList, provider)).toBe(listHandler);
    });

    it('returns the registered enum handler', () => {
      const factory = new CustomHandlerFactory();
      const provider = new StdHandlerProvider(factory);
      const colorHandler = constantHandler('red', 'Color');
      factory.register(ColorType, colorHandler);

      expect(factory.createEnumHandler(config, ColorType, provider)).toBe(colorHandler);
    });

    it('does not consult the base chain on a hit', () => {
      const spy = vi.spyOn(BasicHandlerFactory.prototype, 'createRecordHandler');
      const factory = new CustomHandlerFactory();
      factory.register(MoneyType, compactMoneyHandler);

      factory.createRecordHandler(config, MoneyType, new StdHandlerProvider(factory));

      expect(spy).not.toHaveBeenCalled();
    });

    it('wins over extensions', () => {
      const configured = new CustomHandlerFactory();
      configured.register(MoneyType, compactMoneyHandler);
      const factory = configured
        .withExtension(answeringExtension(constantHandler('first')))
        .withExtension(answeringExtension(constantHandler('second')));

      const handler = factory.createRecordHandler(config, MoneyType, new StdHandlerProvider(factory));

      expect(handler).toBe(compactMoneyHandler);
    });

    it('applies to nested values', () => {
      const factory = new CustomHandlerFactory();
      factory.register(MoneyType, compactMoneyHandler);
      const provider = new StdHandlerProvider(factory);

      const price = provider.readValue(PriceType, { net: '12.5 EUR', label: 'standard' });

      expect(price).toEqual({ net: { amount: 12.5, currency: 'EUR' }, label: 'standard' });
    });

    it('accepts handlers producing a narrower type', () => {
      interface EuroMoney extends Money {
        currency: 'EUR';
      }
      const euroHandler: ValueHandler<EuroMoney> = {
        handledType: 'billing.EuroMoney',
        deserialize: (input) => ({ amount: Number(input), currency: 'EUR' }),
      };
      const factory = new CustomHandlerFactory();
      factory.register(MoneyType, euroHandler);

      expect(new StdHandlerProvider(factory).readValue(MoneyType, 3)).toEqual({
        amount: 3,
        currency: 'EUR',
      });
    });

    it('matches exact types only', () => {
      const factory = new CustomHandlerFactory();
      const provider = new StdHandlerProvider(factory);
      const entityHandler = constantHandler({ kind: 'entity' }, 'Entity');
      factory.register(EntityType, entityHandler);

      const handler = factory.createRecordHandler(config, AccountType, provider);

      expect(handler).not.toBe(entityHandler);
      expect(handler).toBeInstanceOf(RecordHandler);
    });

    it('ignores type parameters when matching', () => {
      const factory = new CustomHandlerFactory();
      const provider = new StdHandlerProvider(factory);
      const pageHandler = constantHandler({ page: 1 }, 'Page');
      factory.register(recordType('Page', { typeParameters: [MoneyType] }), pageHandler);

      const pageOfStrings = recordType('Page', { typeParameters: [scalarTypes.string] });

      expect(factory.createRecordHandler(config, pageOfStrings, provider)).toBe(pageHandler);
    });

    it('shares one registry across categories', () => {
      const factory = new CustomHandlerFactory();
      const provider = new StdHandlerProvider(factory);
      const statusHandler = constantHandler('active', 'Status');
      factory.register(enumType('Status', ['active', 'closed']), statusHandler);

      const handler = factory.createRecordHandler(config, recordType('Status'), provider);

      expect(handler).toBe(statusHandler);
    });

    it('uses the latest registration for a type', () => {
      const factory = new CustomHandlerFactory();
      const provider = new StdHandlerProvider(factory);
      const replacement = constantHandler<Money>({ amount: 0, currency: 'XXX' });
      factory.register(MoneyType, compactMoneyHandler);
      factory.register(MoneyType, replacement);

      expect(factory.createRecordHandler(config, MoneyType, provider)).toBe(replacement);
      expect(factory.registeredKeys().map((key) => key.token)).toEqual(['billing.Money']);
    });
  });

  describe('delegation on a miss', () => {
    it('returns what the base chain returns', () => {
      const spy = vi.spyOn(BasicHandlerFactory.prototype, 'createRecordHandler');
      const factory = new CustomHandlerFactory();
      const provider = new StdHandlerProvider(factory);
      factory.register(MoneyType, compactMoneyHandler);

      const handler = factory.createRecordHandler(config, PriceType, provider);

      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy).toHaveBeenCalledWith(config, PriceType, provider);
      expect(handler).toBe(spy.mock.results[0].value);
    });

    it('passes array and enum arguments unchanged', () => {
      const arraySpy = vi.spyOn(BasicHandlerFactory.prototype, 'createArrayHandler');
      const enumSpy = vi.spyOn(BasicHandlerFactory.prototype, 'createEnumHandler');
      const factory = new CustomHandlerFactory();
      const provider = new StdHandlerProvider(factory);
      const moneyList = arrayType(MoneyType);

      const arrayHandler = factory.createArrayHandler(config, moneyList, provider);
      const enumHandler = factory.createEnumHandler(config, ColorType, provider);

      expect(arraySpy).toHaveBeenCalledWith(config, moneyList, provider);
      expect(arrayHandler).toBe(arraySpy.mock.results[0].value);
      expect(enumSpy).toHaveBeenCalledWith(config, ColorType, provider);
      expect(enumHandler).toBe(enumSpy.mock.results[0].value);
    });

    it('returns the extension handler chosen by the base chain', () => {
      const priceHandler = constantHandler('price', 'billing.Price');
      const factory = new CustomHandlerFactory().withExtension(priceExtension(priceHandler));

      const handler = factory.createRecordHandler(config, PriceType, new StdHandlerProvider(factory));

      expect(handler).toBe(priceHandler);
    });

    it('lets base chain errors through unwrapped', () => {
      const factory = new CustomHandlerFactory();
      const empty = enumType('Empty', []);

      expect(() => factory.createEnumHandler(config, empty, new StdHandlerProvider(factory))).toThrow(
        new HandlerCreationError('Empty', 'enum declares no values')
      );
    });

    it('lets extension errors through as the same object', () => {
      const failure = new Error('extension failed');
      const factory = new CustomHandlerFactory().withExtension({
        findRecordHandler: () => {
          throw failure;
        },
      });

      let caught: unknown;
      try {
        factory.createRecordHandler(config, PriceType, new StdHandlerProvider(factory));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBe(failure);
    });
  });

  describe('mixin overlays', () => {
    const PublicApiView = recordType('PublicApiView', {
      namespace: 'api',
      properties: [
        { name: 'name', type: scalarTypes.string },
        { name: 'secret', type: scalarTypes.string },
      ],
    });
    const InternalAnnotations = recordType('InternalAnnotations', {
      properties: [{ name: 'secret', type: scalarTypes.unknown, annotations: { ignore: true } }],
    });
    const LegacyAnnotations = recordType('LegacyAnnotations', {
      properties: [{ name: 'name', type: scalarTypes.unknown, annotations: { alias: 'title' } }],
    });

    it('stores the overlay source', () => {
      const factory = new CustomHandlerFactory();

      factory.setOverlay(PublicApiView, InternalAnnotations);

      expect(factory.getOverlay(keyOf(PublicApiView))?.token).toBe('InternalAnnotations');
      expect(factory.getOverlaySource(keyOf(PublicApiView))).toBe(InternalAnnotations);
    });

    it('keeps the last overlay for a destination', () => {
      const factory = new CustomHandlerFactory();

      factory.setOverlay(PublicApiView, InternalAnnotations);
      factory.setOverlay(PublicApiView, LegacyAnnotations);

      expect(factory.getOverlay(keyOf(PublicApiView))?.equals(keyOf(LegacyAnnotations))).toBe(true);
    });

    it('returns undefined for types without overlay', () => {
      expect(new CustomHandlerFactory().getOverlay(keyOf(PublicApiView))).toBeUndefined();
    });

    it('feeds the overlay to record introspection', () => {
      const factory = new CustomHandlerFactory();
      factory.setOverlay(PublicApiView, InternalAnnotations);
      const provider = new StdHandlerProvider(factory);

      const view = provider.readValue(PublicApiView, { name: 'report', secret: 'test-secret' });

      expect(view).toEqual({ name: 'report' });
    });
  });

  describe('withExtension', () => {
    it('returns a new factory and leaves the original unchanged', () => {
      const priceHandler = constantHandler('price', 'billing.Price');
      const original = new CustomHandlerFactory();

      const extended = original.withExtension(priceExtension(priceHandler));

      expect(extended).not.toBe(original);
      expect(original.getExtensions()).toHaveLength(0);
      expect(extended.getExtensions()).toHaveLength(1);
      expect(
        original.createRecordHandler(config, PriceType, new StdHandlerProvider(original))
      ).toBeInstanceOf(RecordHandler);
      expect(
        extended.createRecordHandler(config, PriceType, new StdHandlerProvider(extended))
      ).toBe(priceHandler);
    });

    it('keeps every earlier extension, newest first', () => {
      const secondHandler = constantHandler('second');
      const first = answeringExtension(constantHandler('first'));
      const second = answeringExtension(secondHandler);

      const factory = new CustomHandlerFactory().withExtension(first).withExtension(second);

      expect(factory.getExtensions()).toEqual([second, first]);
      expect(factory.createEnumHandler(config, ColorType, new StdHandlerProvider(factory))).toBe(
        secondHandler
      );
    });

    it('carries mappings and overlays over', () => {
      const Overlay = recordType('Overlay');
      const original = new CustomHandlerFactory();
      original.register(MoneyType, compactMoneyHandler);
      original.setOverlay(PriceType, Overlay);

      const extended = original.withExtension({});

      expect(extended.createRecordHandler(config, MoneyType, new StdHandlerProvider(extended))).toBe(
        compactMoneyHandler
      );
      expect(extended.getOverlaySource(keyOf(PriceType))).toBe(Overlay);
    });

    it('does not share later configuration', () => {
      const original = new CustomHandlerFactory();
      const extended = original.withExtension({});

      original.register(MoneyType, compactMoneyHandler);
      extended.register(PriceType, constantHandler({ label: 'price' }));

      expect(extended.registeredKeys().map((key) => key.token)).toEqual(['billing.Price']);
      expect(original.registeredKeys().map((key) => key.token)).toEqual(['billing.Money']);
    });

    it('rejects a null extension and keeps the factory intact', () => {
      const factory = new CustomHandlerFactory();
      factory.register(MoneyType, compactMoneyHandler);

      expect(() => factory.withExtension(null as unknown as HandlerExtension)).toThrow(
        new FactoryConfigurationError('Cannot add an absent or invalid handler extension', 'CustomHandlerFactory')
      );
      expect(factory.getExtensions()).toHaveLength(0);
      expect(factory.createRecordHandler(config, MoneyType, new StdHandlerProvider(factory))).toBe(
        compactMoneyHandler
      );
    });

    it('rejects an extension with non-function members', () => {
      const factory = new CustomHandlerFactory();
      const invalid = { findRecordHandler: 'money' } as unknown as HandlerExtension;

      expect(() => factory.withExtension(invalid)).toThrow(FactoryConfigurationError);
    });
  });

  describe('specialized factories', () => {
    it('fails fast when a subclass has no copy strategy', () => {
      const factory = new TenantFactory('acme');
      factory.register(MoneyType, compactMoneyHandler);

      let caught: unknown;
      try {
        factory.withExtension({});
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(FactoryConfigurationError);
      expect((caught as FactoryConfigurationError).factoryType).toBe('TenantFactory');
      expect((caught as FactoryConfigurationError).message).toBe(
        "Subtype of CustomHandlerFactory (TenantFactory) has not overridden method 'copyWith': " +
          'cannot create a copy with additional handler extensions'
      );
    });

    it('leaves the subclass state untouched after failing', () => {
      const factory = new TenantFactory('acme');
      factory.register(MoneyType, compactMoneyHandler);

      expect(() => factory.withExtension({})).toThrow(FactoryConfigurationError);

      expect(factory.tenant).toBe('acme');
      expect(factory.getExtensions()).toHaveLength(0);
      expect(factory.registeredKeys().map((key) => key.token)).toEqual(['billing.Money']);
    });

    it('uses the copy strategy a subclass supplies', () => {
      const factory = new AuditedFactory('audit-1');
      factory.register(MoneyType, compactMoneyHandler);

      const extended = factory.withExtension({});

      expect(extended).toBeInstanceOf(AuditedFactory);
      expect(extended).toHaveProperty('auditLabel', 'audit-1');
      expect(extended.getExtensions()).toHaveLength(1);
      expect(extended.registeredKeys().map((key) => key.token)).toEqual(['billing.Money']);
    });

    it('requires every level of subclass to supply its own copy strategy', () => {
      const factory = new StrictAuditedFactory('audit-2');

      expect(() => factory.withExtension({})).toThrow(
        "Subtype of CustomHandlerFactory (StrictAuditedFactory) has not overridden method 'copyWith'"
      );
    });
  });

  describe('concurrent reads', () => {
    it('returns the sequential results for interleaved readers', async () => {
      const factory = new CustomHandlerFactory().withExtension(
        priceExtension(constantHandler({ net: null, label: 'extension' }, 'billing.Price'))
      );
      factory.register(MoneyType, compactMoneyHandler);
      factory.setOverlay(
        AccountType,
        recordType('AccountMixin', {
          properties: [{ name: 'owner', type: scalarTypes.unknown, annotations: { alias: 'holder' } }],
        })
      );
      const provider = new StdHandlerProvider(factory);

      const reads = [
        () => provider.readValue(MoneyType, '7 USD'),
        () => provider.readValue(PriceType, { net: '1 EUR' }),
        () => provider.readValue(AccountType, { id: 'a-1', holder: 'ada', createdAt: 3 }),
        () => provider.readValue(arrayType(ColorType), ['red', 'blue']),
      ];
      const baseline = reads.map((read) => read());

      const results = await Promise.all(
        Array.from({ length: 64 }, async (_, index) => {
          await new Promise((resolve) => setTimeout(resolve, index % 3));
          return reads[index % reads.length]();
        })
      );

      results.forEach((result, index) => {
        expect(result).toEqual(baseline[index % reads.length]);
      });
      expect(baseline).toEqual([
        { amount: 7, currency: 'USD' },
        { net: null, label: 'extension' },
        { id: 'a-1', createdAt: 3, owner: 'ada' },
        ['red', 'blue'],
      ]);
    });
  });

  describe('end to end', () => {
    it('overrides Money, delegates Price, stores overlays and rejects null extensions', () => {
      const factory = new CustomHandlerFactory();
      const provider = new StdHandlerProvider(factory);
      const PublicApiView = recordType('PublicApiView');
      const InternalAnnotations = recordType('InternalAnnotations');

      factory.register(MoneyType, compactMoneyHandler);
      expect(factory.createRecordHandler(config, MoneyType, provider)).toBe(compactMoneyHandler);

      expect(factory.createRecordHandler(config, PriceType, provider)).toBeInstanceOf(RecordHandler);

      factory.setOverlay(PublicApiView, InternalAnnotations);
      expect(factory.getOverlay(keyOf(PublicApiView))?.token).toBe('InternalAnnotations');

      expect(() => factory.withExtension(null as unknown as HandlerExtension)).toThrow(
        FactoryConfigurationError
      );
      expect(factory.createRecordHandler(config, MoneyType, provider)).toBe(compactMoneyHandler);
    });
  });
});
