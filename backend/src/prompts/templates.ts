export interface TemplateContext {
  businessName: string;
  supportEmail: string;
}

/** Canned replies used whenever the model is bypassed. */
export interface ResponseTemplates {
  greeting: string;
  apology: string;
  noResults: string;
  trackingNotFound: string;
  /** Returned by the top-level guard when a turn fails outright. */
  technicalDifficulties: string;
}

export function buildTemplates({ businessName, supportEmail }: TemplateContext): ResponseTemplates {
  return {
    greeting: `Hello! Welcome to ${businessName}!

I'm here to help you with:
• Information about our teas
• Tracking your DHL shipments
• Questions about ordering and our products

How can I assist you today?`,

    apology: `I apologize, but I'm having trouble processing your request right now.

Please try:
• Rephrasing your question
• Checking that your tracking number is correct
• Contacting our support team at ${supportEmail}`,

    noResults: `I don't have specific information about that in my knowledge base right now.

However, I can help you with:
• Our teas and how to brew them
• Pricing and ordering
• Shipping and delivery

Or contact us at ${supportEmail} for personalized assistance. What would you like to know?`,

    trackingNotFound: `I couldn't find tracking information for that number.

Please check:
• The tracking number is correct (usually 10-39 characters)
• You're using the complete number from your shipping email
• The shipment may not be in the system yet (this can take 24 hours)

If you keep having trouble, contact our support team at ${supportEmail}.`,

    technicalDifficulties: `I apologize, but I'm experiencing technical difficulties right now. Please try again in a moment, or contact our support team at ${supportEmail} for immediate assistance.`,
  };
}
