export * from './CheckUtil';
export * from './CounterexampleUtil';
export * from './DecideUtil';
export * from './DerivationUtil';
export * from './FormulaUtil';
export * from './LogUtil';
export * from './NormalizeUtil';
export * from './ParseUtil';
export * from './ReductioUtil';
export * from './Run';
