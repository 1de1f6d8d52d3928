import type { Model, ModelStatic } from "sequelize";

/**
 * A Sequelize model class whose instances have attributes T and are
 * created from C.
 */
export type ModelDef<T extends object, C extends object = T> = ModelStatic<Model<T, C>>;
