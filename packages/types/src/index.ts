// ============================================================================
// Parameter Types
// ============================================================================

/**
 * Leaf value stored in a parameter tree
 */
export type ParameterValue = string | number | boolean | null;

/**
 * Plain-object form of a hierarchical parameter set.
 * Interior nodes are nested trees, leaves are parameter values.
 */
export interface ParameterTree {
  [name: string]: ParameterValue | ParameterTree;
}

// ============================================================================
// Film Types
// ============================================================================

/**
 * - fixed_length: acquisition stops after a predetermined number of frames
 * - run_till_abort: acquisition runs until stopped externally
 */
export type AcquisitionMode = "fixed_length" | "run_till_abort";

export interface FilmSettingsInit {
  acquisitionMode: AcquisitionMode;
  filmLength?: number;
  basename?: string;
}

// ============================================================================
// Camera Types
// ============================================================================

export type TaskQueueMode = "queue" | "reject";

/**
 * One camera entry in the camera configuration file
 */
export interface CameraConfig {
  name: string;
  /** Registered driver type, e.g. "mock" */
  driver: string;
  master: boolean;
  parameters: ParameterTree;
}

export interface CameraFunctionalityInit {
  cameraName: string;
  timeBase: string;
  isMaster: boolean;
  hasShutter: boolean;
  maxIntensity: number;
  frameRate: number;
}
