import type { Config } from '../config.js';

export const testConfig: Config = {
  enableAttributionLinks: false,
  requestTimeoutMs: 1000,
  networkRetries: 1,
  retryDelayMs: 0,
};

export function pexelsPhoto(id: number) {
  return {
    id,
    width: 4000,
    height: 3000,
    url: `https://www.pexels.com/photo/${id}/`,
    photographer: 'Ada Lens',
    photographer_url: 'https://www.pexels.com/@ada-lens',
    alt: 'Red bicycle against a wall',
    src: {
      original: `https://images.pexels.com/photos/${id}/original.jpeg`,
      large: `https://images.pexels.com/photos/${id}/large.jpeg`,
      medium: `https://images.pexels.com/photos/${id}/medium.jpeg`,
      small: `https://images.pexels.com/photos/${id}/small.jpeg`,
      tiny: `https://images.pexels.com/photos/${id}/tiny.jpeg`,
    },
  };
}

export function unsplashPhoto(id: string) {
  return {
    id,
    width: 3000,
    height: 2000,
    description: null,
    alt_description: 'mountain lake at dawn',
    urls: {
      full: `https://images.unsplash.com/${id}?full`,
      regular: `https://images.unsplash.com/${id}?regular`,
      small: `https://images.unsplash.com/${id}?small`,
    },
    links: { html: `https://unsplash.com/photos/${id}` },
    user: {
      name: 'Bo Shutter',
      links: { html: 'https://unsplash.com/@boshutter' },
    },
    tags: [{ title: 'lake' }, { title: 'mountain' }],
  };
}

export function pixabayHit(id: number) {
  return {
    id,
    pageURL: `https://pixabay.com/photos/forest-${id}/`,
    type: 'photo',
    tags: 'forest, trees, fog',
    previewURL: `https://cdn.pixabay.com/photo/${id}_150.jpg`,
    webformatURL: `https://cdn.pixabay.com/photo/${id}_640.jpg`,
    largeImageURL: `https://cdn.pixabay.com/photo/${id}_1280.jpg`,
    imageWidth: 5000,
    imageHeight: 3333,
    user_id: 42,
    user: 'CoraFrame',
  };
}
