export { SlideAssembler } from './assembler.js';
export { TemplateCatalog, TEMPLATE_NAME_RE } from './template-catalog.js';
export { readPptx } from './pptx-reader.js';
export { writePptx, SHAPE_NAMES } from './pptx-writer.js';
export { loadImage, imageFromBytes, fitToBox, IMAGE_BOX, IMAGE_OFFSET } from './image.js';
