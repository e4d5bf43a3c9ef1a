import { TimestampIdGenerator } from '../../src/infrastructure/common/TimestampIdGenerator';

describe('TimestampIdGenerator', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should prefix ids and embed the timestamp', () => {
    jest.spyOn(Date, 'now').mockReturnValue(1700000000000);
    const generator = new TimestampIdGenerator();

    const id = generator.generate('email');

    expect(id.startsWith('email_1700000000000_')).toBe(true);
    expect(generator.validate(id)).toBe(true);
  });

  it('should keep ids distinct within one millisecond', () => {
    jest.spyOn(Date, 'now').mockReturnValue(1700000000000);
    jest.spyOn(Math, 'random').mockReturnValue(0.5);
    const generator = new TimestampIdGenerator();

    const ids = Array.from({ length: 50 }, () => generator.generate('att'));

    expect(new Set(ids).size).toBe(50);
  });

  it('should reject ids without a timestamp segment', () => {
    const generator = new TimestampIdGenerator();
    expect(generator.validate('email-001-regular')).toBe(false);
    expect(generator.validate('email_abc_x')).toBe(false);
  });
});
