export {
  createRumor,
  createSeal,
  createGiftWrap,
  createPrivateDirectMessage,
  unwrapGiftWrap,
} from './giftwrap.js';
