/**
 * Rule Engine
 *
 * Keyword-driven responder used when no generative backend is configured or
 * the backend call fails. Intents are checked in a fixed order and the first
 * match wins:
 *
 *   greeting -> menu_query -> dietary_query -> recommendation_request
 *            -> specific_item_query -> general_conversation
 *
 * Keywords and item names match as plain substrings of the lower-cased
 * message, so "food" also fires inside "seafood". Never throws: anything
 * unmatched is general conversation.
 */

import { FEATURED_ITEM_COUNT } from '../../config/index.js';
import type { MenuItem, Tenant } from '../../store/tenant.types.js';
import type { DialogueSession } from './dialogue-session.store.js';
import { assistantName, formatPrice } from './prompt-builder.js';
import { pickOne, sampleWithoutReplacement, type RandomSource } from './random-source.js';

export type Intent =
  | 'greeting'
  | 'menu_query'
  | 'dietary_query'
  | 'recommendation_request'
  | 'specific_item_query'
  | 'general_conversation';

export interface RuleEngineInput {
  message: string;
  tenant: Tenant;
  menu: readonly MenuItem[];
  session: DialogueSession;
}

export interface RuleEngineReply {
  intent: Intent;
  message: string;
  recommendations: MenuItem[];
  /** Session state after this turn; the caller persists it. */
  session: DialogueSession;
}

type Matcher = (text: string) => boolean;

function containsAny(terms: readonly string[]): Matcher {
  return text => terms.some(term => text.includes(term));
}

const is = {
  greeting: containsAny(['hello', 'hi', 'hey', 'good morning', 'good afternoon', 'good evening']),
  menuQuery: containsAny(['menu', 'dishes', 'food', 'eat', 'order', 'available', 'serve']),
  dietaryQuery: containsAny(['vegetarian', 'vegan', 'gluten', 'allergy', 'dairy', 'nuts']),
  recommendation: containsAny(['recommend', 'suggest', 'best', 'popular', 'hungry', 'mood', 'craving'])
};

const menuTopic = {
  categories: containsAny(['categories', 'types']),
  price: containsAny(['price', 'cost'])
};

const diet = {
  vegetarian: containsAny(['vegetarian']),
  vegan: containsAny(['vegan']),
  glutenFree: containsAny(['gluten'])
};

const itemDetail = {
  ingredients: containsAny(['ingredient']),
  allergens: containsAny(['allerg']),
  spice: containsAny(['spicy', 'hot']),
  prepTime: containsAny(['time'])
};

const smallTalk = {
  howAreYou: containsAny(['how are you', 'how do you do']),
  thanks: containsAny(['thank you', 'thanks']),
  farewell: containsAny(['bye', 'goodbye', 'see you'])
};

/**
 * Mood/craving filters, checked in order. Each predicate is an OR of its
 * conditions. The thresholds are tunables, not a principled ranking.
 */
const MOODS: ReadonlyArray<{ matches: Matcher; filter: (item: MenuItem) => boolean; message: string }> = [
  {
    matches: containsAny(['hungry', 'starving', 'filling']),
    filter: item => item.category === 'main' && (item.calories ?? 0) > 350,
    message: 'You sound really hungry! I recommend our hearty main courses that will definitely satisfy your appetite.'
  },
  {
    matches: containsAny(['light', 'small', 'not very hungry']),
    filter: item => item.category === 'appetizer' || (item.calories !== null && item.calories < 300),
    message: 'For something light, our appetizers are perfect, or I can suggest some lighter main dishes.'
  },
  {
    matches: containsAny(['spicy', 'hot']),
    filter: item => item.spiceLevel > 2,
    message: "Looking for some heat? Our spicy dishes will definitely give you that kick you're craving!"
  },
  {
    matches: containsAny(['healthy', 'nutritious', 'diet']),
    filter: item => (item.calories !== null && item.calories < 400) || item.glutenFree,
    message: 'For healthy choices, I recommend our nutritious options that are both delicious and good for you.'
  },
  {
    matches: containsAny(['sweet', 'dessert']),
    filter: item => item.category === 'dessert',
    message: 'Our desserts are absolutely divine! Perfect way to end your meal on a sweet note.'
  }
];

/**
 * Popularity stand-in: ascending calories + (30 - price). Kept for
 * behavioural compatibility; tune or replace with real order data.
 */
export function popularItems(menu: readonly MenuItem[], count = 3): MenuItem[] {
  const score = (item: MenuItem) => (item.calories ?? 0) + (30 - item.price);
  return [...menu].sort((a, b) => score(a) - score(b)).slice(0, count);
}

function withStop(sentence: string): string {
  const trimmed = sentence.trim();
  return /[.!?]$/.test(trimmed) ? trimmed : `${trimmed}.`;
}

function recommendSentence(items: readonly MenuItem[]): string {
  return items.length > 0 ? `I especially recommend: ${items.map(i => i.name).join(' and ')}.` : '';
}

function joinSentences(...parts: string[]): string {
  return parts.filter(Boolean).join(' ');
}

function findNamedItem(text: string, menu: readonly MenuItem[]): MenuItem | undefined {
  return menu.find(item => item.name && text.includes(item.name.toLowerCase()));
}

function mentionsIngredient(text: string, menu: readonly MenuItem[]): boolean {
  return menu.some(item => item.ingredients.some(ing => ing && text.includes(ing.toLowerCase())));
}

export class RuleEngine {
  constructor(private readonly random: RandomSource) {}

  classify(message: string, menu: readonly MenuItem[]): Intent {
    const text = message.trim().toLowerCase();

    if (is.greeting(text)) return 'greeting';
    if (is.menuQuery(text)) return 'menu_query';
    if (is.dietaryQuery(text)) return 'dietary_query';
    if (is.recommendation(text)) return 'recommendation_request';
    if (findNamedItem(text, menu) || mentionsIngredient(text, menu)) return 'specific_item_query';
    return 'general_conversation';
  }

  respond(input: RuleEngineInput): RuleEngineReply {
    const text = input.message.trim().toLowerCase();
    const intent = this.classify(text, input.menu);
    const session = { ...input.session };

    switch (intent) {
      case 'greeting':
        return { intent, ...this.greeting(input.tenant, input.menu, session), session: { ...session, greeted: true } };
      case 'menu_query':
        return { intent, ...this.menuQuery(text, input.menu), session };
      case 'dietary_query':
        return { intent, ...this.dietaryQuery(text, input.menu), session };
      case 'recommendation_request':
        return { intent, ...this.recommendationRequest(text, input.menu), session };
      case 'specific_item_query':
        return { intent, ...this.specificItemQuery(text, input.menu), session };
      case 'general_conversation':
        return { intent, ...this.generalConversation(text, input.tenant, input.menu), session };
    }
  }

  private greeting(tenant: Tenant, menu: readonly MenuItem[], session: DialogueSession): Reply {
    const ai = assistantName(tenant);
    const featured = menu.slice(0, FEATURED_ITEM_COUNT);

    if (session.greeted) {
      return {
        message: this.pick([
          'Nice to see you again! What else can I help you with from our menu?',
          'How can I assist you further with your dining choices?',
          'What other questions do you have about our dishes?'
        ]),
        recommendations: featured
      };
    }

    const welcome = tenant.welcomeMessage?.trim();
    return {
      message:
        welcome ||
        this.pick([
          `Hello! Welcome to ${tenant.name}! I'm ${ai}, here to help you discover delicious dishes that match your taste. What can I help you find today?`,
          `Hi there! I'm ${ai}, and I'm excited to help you explore the ${tenant.name} menu. Are you looking for something specific, or would you like some popular options?`,
          `Welcome to ${tenant.name}! Whether you're craving something specific or want to try something new, I'm here to help. What sounds good to you?`
        ]),
      recommendations: featured
    };
  }

  private menuQuery(text: string, menu: readonly MenuItem[]): Reply {
    const recommendations = this.sample(menu, 3);

    if (menu.length === 0) {
      return { message: "Our menu is being updated right now. Please check back soon!", recommendations };
    }

    if (menuTopic.categories(text)) {
      const categories = [...new Set(menu.map(item => item.category))];
      return {
        message: `We offer dishes in these categories: ${categories.join(', ')}. We have ${menu.length} delicious options total. Would you like to explore any specific category?`,
        recommendations
      };
    }

    if (menuTopic.price(text)) {
      const prices = menu.map(item => item.price);
      return {
        message: `Our menu prices range from ${formatPrice(Math.min(...prices))} to ${formatPrice(Math.max(...prices))}. What's your budget range today?`,
        recommendations
      };
    }

    return {
      message: `Our menu features ${menu.length} carefully crafted dishes. We have options for every dietary preference and taste. What type of food are you in the mood for?`,
      recommendations
    };
  }

  private dietaryQuery(text: string, menu: readonly MenuItem[]): Reply {
    let opening: string;
    let recommendations: MenuItem[];

    if (diet.vegetarian(text)) {
      const matching = menu.filter(item => item.vegetarian);
      opening = `We have ${matching.length} delicious vegetarian options!`;
      recommendations = matching.slice(0, 2);
    } else if (diet.vegan(text)) {
      const matching = menu.filter(item => item.vegan);
      opening = `We offer ${matching.length} tasty vegan dishes!`;
      recommendations = matching.slice(0, 2);
    } else if (diet.glutenFree(text)) {
      const matching = menu.filter(item => item.glutenFree);
      opening = `We have ${matching.length} gluten-free options available!`;
      recommendations = matching.slice(0, 2);
    } else {
      opening =
        "I'd be happy to help with dietary preferences! We accommodate vegetarian, vegan, and gluten-free diets, and we list the allergens for each dish. What specific dietary needs do you have?";
      recommendations = this.sample(menu, 2);
    }

    return { message: joinSentences(opening, recommendSentence(recommendations)), recommendations };
  }

  private recommendationRequest(text: string, menu: readonly MenuItem[]): Reply {
    const mood = MOODS.find(m => m.matches(text));
    if (mood) {
      return { message: mood.message, recommendations: menu.filter(mood.filter).slice(0, 2) };
    }
    return {
      message: "I'd love to recommend some of our most popular dishes that guests absolutely love!",
      recommendations: popularItems(menu).slice(0, 2)
    };
  }

  private specificItemQuery(text: string, menu: readonly MenuItem[]): Reply {
    const item = findNamedItem(text, menu);
    if (!item) {
      return {
        message:
          "I'd be happy to tell you about any of our dishes! Could you be more specific about which item you're interested in, or would you like me to suggest something based on your preferences?",
        recommendations: this.sample(menu, 2)
      };
    }

    const details: string[] = [
      `Great choice! Our ${item.name} is ${withStop(item.description || 'one of our specialties')}`,
      `It's priced at ${formatPrice(item.price)}.`
    ];

    if (itemDetail.ingredients(text)) {
      details.push(
        item.ingredients.length > 0
          ? `The main ingredients are: ${item.ingredients.join(', ')}.`
          : "I don't have the full ingredient list for this dish yet."
      );
    }
    if (itemDetail.allergens(text)) {
      details.push(
        item.allergens.length > 0
          ? `Please note it contains: ${item.allergens.join(', ')}.`
          : 'This dish has no major allergens.'
      );
    }
    if (itemDetail.spice(text)) {
      details.push(`The spice level is ${item.spiceLevel} out of 5.`);
    }
    if (itemDetail.prepTime(text) && item.prepTime) {
      details.push(`Preparation time is about ${item.prepTime}.`);
    }

    return { message: joinSentences(...details), recommendations: [item] };
  }

  private generalConversation(text: string, tenant: Tenant, menu: readonly MenuItem[]): Reply {
    let options: string[];

    if (smallTalk.howAreYou(text)) {
      options = [
        "I'm doing great, thank you for asking! I'm excited to help you find something delicious to eat. What sounds good to you today?",
        "I'm wonderful, thanks! Ready to help you discover your next favorite dish. What are you in the mood for?"
      ];
    } else if (smallTalk.thanks(text)) {
      options = [
        "You're very welcome! I'm here whenever you need help with our menu. Anything else I can assist you with?",
        "My pleasure! I love helping people find great food. Is there anything else you'd like to know?"
      ];
    } else if (smallTalk.farewell(text)) {
      options = [
        `Goodbye! I hope you enjoy your meal at ${tenant.name}. Come back anytime!`,
        'Have a fantastic meal! It was great helping you today. See you next time!'
      ];
    } else {
      options = [
        "That's an interesting question! While I specialize in helping with our menu and dining recommendations, I'm always happy to chat. Is there anything from our menu I can help you with?",
        "I appreciate you asking! I'm here primarily to help you navigate our delicious menu options. What kind of flavors are you craving today?",
        "Thanks for sharing! I'd love to help you find something amazing to eat. Are you looking for any particular type of dish?"
      ];
    }

    return { message: this.pick(options), recommendations: this.sample(menu, 2) };
  }

  private pick(options: readonly string[]): string {
    return pickOne(options, this.random) ?? '';
  }

  private sample(menu: readonly MenuItem[], count: number): MenuItem[] {
    return sampleWithoutReplacement(menu, count, this.random);
  }
}

type Reply = Pick<RuleEngineReply, 'message' | 'recommendations'>;
