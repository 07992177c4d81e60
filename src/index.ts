export * from './types';
export * from './simulation/config';
export * from './simulation/lattice';
export * from './simulation/particleData';
export * from './simulation/initialization';
export * from './simulation/collisions';
export * from './simulation/history';
export * from './simulation/statistics';
export * from './simulation/binOverlay';
export * from './simulation/lorentzGas';
export * from './store/simulationStore';
