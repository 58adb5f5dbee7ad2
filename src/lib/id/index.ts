export { type Brand, type IdCodec, type IdGenerator, type IdType, withGenerator } from "./id-type"
export { isUuid, uuidIdType } from "./uuid"
