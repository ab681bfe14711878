
/** the class info record every archived object's `$class` points at */
export type IArchivedClass = {
  readonly $classes: readonly string[];
  readonly $classname: string;
};
