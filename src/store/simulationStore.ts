import { createStore } from 'zustand/vanilla';
import {
  BinCell,
  HistorySnapshot,
  SimulationParameters,
  Vec2,
} from '../types';
import { buildBinOverlay } from '../simulation/binOverlay';
import { TRACE_DT, TRACE_STEPS, TWO_PI } from '../simulation/config';
import { RandomSource } from '../simulation/initialization';
import { listAtomCenters } from '../simulation/lattice';
import {
  addParticle,
  clearStatistics,
  createSimulationState,
  getHistory,
  getPositions,
  setAtomR,
  setBinIndex,
  setBinsCount,
  setDimensions,
  setElectronR,
  setPaintTraceOnly,
  setParticleCount,
  setSide,
  setSpeed,
  SimulationState,
  step,
  SimulationStateOptions,
  traceTrajectories,
} from '../simulation/lorentzGas';

export interface SimulationFrame {
  positions: Float64Array;
  atoms: Vec2[];
  history: HistorySnapshot;
  bins: BinCell[];
  trace: Float64Array[];
}

export interface SimulationStore {
  simulation: SimulationState;
  frame: SimulationFrame;
  version: number;

  playing: boolean;
  traceMode: boolean;
  wasRunning: boolean;
  showBins: boolean;
  defaultDirection: number;
  randomDirection: boolean;

  tick: (elapsed: number) => void;
  setPlaying: (playing: boolean) => void;
  togglePlay: () => void;
  setTraceMode: (active: boolean) => void;
  addAtPointer: (begin: Vec2, end: Vec2) => void;
  clear: () => void;

  setDimensions: (width: number, height: number) => void;
  setNumber: (count: number) => void;
  setSide: (side: number) => void;
  setAtomR: (atomR: number) => void;
  setElectronR: (electronR: number) => void;
  setSpeed: (speed: number) => void;
  setBinsNumber: (nbins: number) => void;
  setBinIndex: (bin: number) => void;
  setShowBins: (showBins: boolean) => void;
  setDefaultDirection: (angle: number) => void;
  setDefaultRandom: (randomDirection: boolean) => void;
}

export interface SimulationStoreOptions extends SimulationStateOptions {
  parameters?: Partial<SimulationParameters>;
  random?: RandomSource;
  traceSteps?: number;
  traceDt?: number;
}

/**
 * Store backing the drawing and plotting layer. It owns one simulation,
 * forwards parameter changes to it and republishes a frame after each change.
 */
export function createSimulationStore(options: SimulationStoreOptions = {}) {
  const {
    parameters,
    random = Math.random,
    traceSteps = TRACE_STEPS,
    traceDt = TRACE_DT,
    ...stateOptions
  } = options;

  const simulation = createSimulationState(parameters, stateOptions);

  // Atom centers only move when the arena or the spacing changes
  const listAtoms = () =>
    listAtomCenters(simulation.lattice, simulation.params.width, simulation.params.height);
  let atoms = listAtoms();

  const buildFrame = (showBins: boolean, traceMode: boolean): SimulationFrame => {
    const { params, stats } = simulation;
    return {
      positions: getPositions(simulation),
      atoms,
      history: getHistory(simulation),
      bins: showBins ? buildBinOverlay(stats.density, params.width, params.bin) : [],
      trace: traceMode ? traceTrajectories(simulation, traceSteps, traceDt) : [],
    };
  };

  return createStore<SimulationStore>((set, get) => {
    const publish = () =>
      set((state) => ({
        frame: buildFrame(state.showBins, state.traceMode),
        version: state.version + 1,
      }));

    return {
      simulation,
      frame: buildFrame(false, false),
      version: 0,

      playing: false,
      traceMode: false,
      wasRunning: false,
      showBins: false,
      defaultDirection: 0,
      randomDirection: true,

      tick: (elapsed) => {
        const { playing, traceMode } = get();
        if (!playing || traceMode) return;
        step(simulation, elapsed, 'normal');
        publish();
      },
      setPlaying: (playing) => set({ playing }),
      togglePlay: () => set((state) => ({ playing: !state.playing })),

      setTraceMode: (active) => {
        const state = get();
        if (active === state.traceMode) return;

        if (active) {
          set({ traceMode: true, wasRunning: state.playing, playing: false });
        } else {
          set({ traceMode: false, playing: state.wasRunning });
        }
        setPaintTraceOnly(simulation, active);
        publish();
      },

      addAtPointer: (begin, end) => {
        const { defaultDirection, randomDirection } = get();
        let angle = randomDirection ? random() * TWO_PI : defaultDirection;
        if (begin.x !== end.x || begin.y !== end.y) {
          angle = Math.atan2(end.y - begin.y, end.x - begin.x);
        }
        addParticle(simulation, begin.x, begin.y, angle);
        publish();
      },

      clear: () => {
        set({ traceMode: false, wasRunning: false, playing: false });
        setPaintTraceOnly(simulation, false);
        setParticleCount(simulation, 0);
        clearStatistics(simulation);
        publish();
      },

      setDimensions: (width, height) => {
        setDimensions(simulation, width, height);
        atoms = listAtoms();
        publish();
      },
      setNumber: (count) => {
        setParticleCount(simulation, Math.max(0, Math.floor(count)), random);
        publish();
      },
      setSide: (side) => {
        setSide(simulation, side);
        atoms = listAtoms();
        publish();
      },
      setAtomR: (atomR) => {
        setAtomR(simulation, atomR);
        publish();
      },
      setElectronR: (electronR) => {
        setElectronR(simulation, electronR);
        publish();
      },
      setSpeed: (speed) => {
        setSpeed(simulation, speed);
        publish();
      },
      setBinsNumber: (nbins) => {
        const count = Math.max(1, Math.floor(nbins));
        setBinsCount(simulation, count);
        if (simulation.params.bin >= count) {
          setBinIndex(simulation, count - 1);
        }
        publish();
      },
      setBinIndex: (bin) => {
        const max = simulation.params.nbins - 1;
        setBinIndex(simulation, Math.min(max, Math.max(0, Math.floor(bin))));
        publish();
      },
      setShowBins: (showBins) => {
        set({ showBins });
        publish();
      },
      setDefaultDirection: (defaultDirection) => set({ defaultDirection }),
      setDefaultRandom: (randomDirection) => set({ randomDirection }),
    };
  });
}

export type SimulationStoreApi = ReturnType<typeof createSimulationStore>;
