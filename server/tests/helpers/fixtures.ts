import type { MenuItem, Tenant } from '../../src/store/tenant.types.js';

export const TENANT_ID = '7d2f4c1e-3b8a-4f5e-9c6d-1a2b3c4d5e6f';
export const OTHER_TENANT_ID = '0c9e8d7f-6a5b-4c3d-8e2f-1a0b9c8d7e6f';

export function makeTenant(overrides: Partial<Tenant> = {}): Tenant {
  return {
    id: TENANT_ID,
    name: 'Trattoria Test',
    subdomain: 'trattoria',
    slug: 'trattoria-test',
    description: 'Neighbourhood Italian kitchen',
    themeConfig: { primaryColor: '#aa3311' },
    aiName: null,
    aiPersonality: null,
    welcomeMessage: null,
    logoUrl: null,
    active: true,
    createdAt: '2024-03-01T12:00:00.000Z',
    ...overrides
  };
}

export function makeMenuItem(overrides: Partial<MenuItem> & Pick<MenuItem, 'id' | 'name'>): MenuItem {
  const { id, name, ...rest } = overrides;
  return {
    id,
    name,
    description: '',
    price: 10,
    category: 'main',
    ingredients: [],
    allergens: [],
    vegetarian: false,
    vegan: false,
    glutenFree: false,
    spiceLevel: 0,
    prepTime: null,
    calories: null,
    chefNotes: null,
    imageUrl: null,
    displayOrder: 0,
    ...rest
  };
}

/**
 * Five items in display order: 4 vegetarian, 2 vegan, 1 gluten-free.
 */
export function sampleMenu(): MenuItem[] {
  return [
    makeMenuItem({
      id: 'item-bruschetta',
      name: 'Bruschetta',
      description: 'Toasted bread with tomato and basil',
      price: 9.5,
      category: 'appetizer',
      ingredients: ['tomato', 'basil', 'bread', 'garlic'],
      allergens: ['gluten'],
      vegetarian: true,
      vegan: true,
      calories: 220,
      prepTime: '10 minutes',
      displayOrder: 1
    }),
    makeMenuItem({
      id: 'item-margherita',
      name: 'Margherita Pizza',
      description: 'Wood-fired pizza with mozzarella',
      price: 16,
      category: 'main',
      ingredients: ['tomato', 'mozzarella', 'basil'],
      allergens: ['gluten', 'dairy'],
      vegetarian: true,
      calories: 800,
      displayOrder: 2
    }),
    makeMenuItem({
      id: 'item-arrabbiata',
      name: 'Spicy Arrabbiata',
      description: 'Penne in a fiery tomato sauce',
      price: 14.25,
      category: 'main',
      ingredients: ['penne', 'chili', 'tomato'],
      allergens: ['gluten'],
      vegetarian: true,
      vegan: true,
      spiceLevel: 3,
      calories: 520,
      displayOrder: 3
    }),
    makeMenuItem({
      id: 'item-salmon',
      name: 'Grilled Salmon',
      description: 'Fresh Atlantic salmon with lemon and dill',
      price: 24,
      category: 'main',
      ingredients: ['salmon', 'lemon', 'dill'],
      allergens: ['fish'],
      glutenFree: true,
      calories: 450,
      prepTime: '20 minutes',
      displayOrder: 4
    }),
    makeMenuItem({
      id: 'item-tiramisu',
      name: 'Tiramisu',
      description: 'Layers of espresso-soaked sponge and mascarpone',
      price: 8,
      category: 'dessert',
      ingredients: ['mascarpone', 'espresso', 'cocoa'],
      allergens: ['dairy', 'eggs', 'gluten'],
      vegetarian: true,
      calories: 400,
      displayOrder: 5
    })
  ];
}
