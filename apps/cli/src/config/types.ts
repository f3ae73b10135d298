export type KeelListsConfig = {
  /** Element types to instantiate, in source spelling (`u8`, `list[Point]`). */
  elementTypes: string[];
  /** Directory the header directory is written into; stdout when absent. */
  outDir?: string;
  headerDir: string;
  accessCache: boolean;
  /** Also instantiate the prelude element types. */
  prelude: boolean;
};
