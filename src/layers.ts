import { Layer } from "effect";
import { FilePriceSourceLayer } from "./price-source/file.price-source.js";

export const serviceLayers = Layer.mergeAll(
    FilePriceSourceLayer,
);
