/**
 * @chesslens/test-utils
 *
 * Shared test utilities: fake engines and position fixtures
 */

// Fixture loading
export {
  loadPosition,
  fenOf,
  getFixturePath,
  type PositionFixture,
  type PositionName,
} from './fixtures/loader.js';

// Fake engine
export {
  createFakeEngine,
  createFakeEngineFactory,
  searchOutput,
  FAKE_ENGINE_NAME,
  type FakeEngine,
  type FakeEngineConfig,
  type FakeEngineFactory,
} from './mocks/fake-uci-engine.js';
