import { classifyQuantity, formatOutcomeStatus, formatQuantity } from '../matching/quantity-classifier';

describe('classifyQuantity', () => {
  test('equal quantities are Ok', () => {
    expect(classifyQuantity(50, 50, 'PO-only')).toEqual({ kind: 'Ok', strategy: 'PO-only' });
  });

  test('more requested than available is an over shipment', () => {
    expect(classifyQuantity(120, 150, 'Job+PO')).toEqual({
      kind: 'OverShipment',
      strategy: 'Job+PO',
      available: 120,
      requested: 150,
    });
  });

  test('less requested than available is a less shipment', () => {
    expect(classifyQuantity(80, 50, 'Style+Color')).toEqual({
      kind: 'LessShipment',
      strategy: 'Style+Color',
      available: 80,
      requested: 50,
    });
  });

  test('zero or blank availability is a no shipment regardless of request', () => {
    expect(classifyQuantity(0, 50, 'PO-only')).toEqual({ kind: 'NoShipment', strategy: 'PO-only' });
    expect(classifyQuantity(null, 0, 'Combined')).toEqual({ kind: 'NoShipment', strategy: 'Combined' });
    expect(classifyQuantity(Number.NaN, 5, 'PO+Job')).toEqual({ kind: 'NoShipment', strategy: 'PO+Job' });
  });

  test('a blank or unparseable request is a no shipment', () => {
    expect(classifyQuantity(10, null, 'PO-only')).toEqual({ kind: 'NoShipment', strategy: 'PO-only' });
    expect(classifyQuantity(10, Number.NaN, 'Job+PO')).toEqual({ kind: 'NoShipment', strategy: 'Job+PO' });
  });

  test('a numeric zero request is still compared', () => {
    expect(classifyQuantity(10, 0, 'PO-only')).toEqual({
      kind: 'LessShipment',
      strategy: 'PO-only',
      available: 10,
      requested: 0,
    });
  });

  test('exact comparison has no tolerance', () => {
    expect(classifyQuantity(10, 10.001, 'PO-only').kind).toBe('OverShipment');
  });
});

describe('formatQuantity', () => {
  test('prints quantities at full precision', () => {
    expect(formatQuantity(150)).toBe('150');
    expect(formatQuantity(12.5)).toBe('12.5');
    expect(formatQuantity(0.1 + 0.2)).toBe('0.30000000000000004');
  });

  test('nearly equal mismatches stay distinguishable', () => {
    expect(
      formatOutcomeStatus({ kind: 'OverShipment', strategy: 'PO-only', available: 10, requested: 10.00001 })
    ).toBe('Over Shipment (PO Match: 10 vs 10.00001)');
  });
});

describe('formatOutcomeStatus', () => {
  test('renders every outcome kind', () => {
    expect(formatOutcomeStatus({ kind: 'Ok', strategy: 'PO-only' })).toBe('Ok (PO Match)');
    expect(formatOutcomeStatus({ kind: 'NoShipment', strategy: 'Job+PO' })).toBe('No Shipment (Job+PO Match)');
    expect(
      formatOutcomeStatus({ kind: 'OverShipment', strategy: 'PO-only', available: 120, requested: 150 })
    ).toBe('Over Shipment (PO Match: 120 vs 150)');
    expect(
      formatOutcomeStatus({ kind: 'LessShipment', strategy: 'Style+Color', available: 80, requested: 50 })
    ).toBe('Less Shipment (Style+Color: 80 vs 50)');
    expect(formatOutcomeStatus({ kind: 'Ok', strategy: 'Combined' })).toBe('Ok (Combined Match)');
    expect(formatOutcomeStatus({ kind: 'NoMatchFound' })).toBe('No Match Found');
    expect(formatOutcomeStatus({ kind: 'NoMatchBuyer' })).toBe('No Match Found (Buyer-Specific)');
  });
});
