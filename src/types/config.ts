/** Configuration types parsed from config/schemodel.md */

/** How a built model treats keys that are not declared fields */
export const EXTRA_MODES = ["ignore", "forbid", "allow"] as const;
export type ExtraMode = (typeof EXTRA_MODES)[number];

/** Configuration set applied by the model builder */
export interface ModelConfig {
  /** Strip (ignore), reject (forbid) or keep (allow) undeclared keys */
  extra?: ExtraMode;
  /** Freeze parsed output */
  frozen?: boolean;
}

export interface SchemodelConfig {
  model: Required<ModelConfig>;
  /** Default namespace recorded on built models */
  module: string;
}

/** Default config when no schemodel.md is found */
export const DEFAULT_SCHEMODEL_CONFIG: SchemodelConfig = {
  model: {
    extra: "ignore",
    frozen: false,
  },
  module: "schemodel",
};
